import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => {
	const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
	return { getLazyChildLogger: () => () => logger };
});

import {
	parseCliValue,
	runConfigGet,
	runConfigList,
	runConfigSet,
	runConfigUnset,
	runConfigValidate,
} from "../../src/commands/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";

describe("parseCliValue", () => {
	it("converts by type", () => {
		expect(parseCliValue("bridge.local")).toBe("bridge.local");
		expect(parseCliValue("8080", "int")).toBe(8080);
		expect(parseCliValue("TRUE", "bool")).toBe(true);
	});

	it("rejects values that do not match the type", () => {
		expect(() => parseCliValue("80x", "int")).toThrow('"80x" is not an integer');
		expect(() => parseCliValue("yes", "bool")).toThrow('"yes" is not true or false');
		expect(() => parseCliValue("1", "float")).toThrow(
			'Unknown value type "float". Use one of: string, int, bool',
		);
	});
});

describe("config commands", () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "cmd-config-"));
		configPath = join(dir, "leviton.json");
		setConfigPath(configPath);
	});

	afterEach(() => {
		resetConfigPath();
		rmSync(dir, { recursive: true, force: true });
	});

	it("encrypts sensitive keys by default", () => {
		expect(runConfigSet("password", "test-secret")).toEqual({
			filePath: configPath,
			encrypted: true,
		});
		expect(runConfigSet("host", "bridge.local")).toEqual({ filePath: configPath, encrypted: false });

		const stored = JSON.parse(readFileSync(configPath, "utf8"));
		expect(stored.host).toBe("bridge.local");
		expect(stored.password.isEncrypted).toBe(true);
	});

	it("honours an explicit encrypt flag", () => {
		expect(runConfigSet("api_key", "test-api-key", { encrypt: false }).encrypted).toBe(false);
		expect(runConfigSet("username", "alice", { encrypt: true }).encrypted).toBe(true);
	});

	it("hides encrypted values unless asked to reveal them", () => {
		runConfigSet("password", "test-secret");

		expect(runConfigGet("password")).toEqual({ found: true, encrypted: true, value: null });
		expect(runConfigGet("password", { reveal: true })).toEqual({
			found: true,
			encrypted: true,
			value: "test-secret",
		});
		expect(runConfigGet("missing")).toEqual({ found: false });
	});

	it("stores typed values", () => {
		runConfigSet("port", "8080", { type: "int" });
		expect(runConfigGet("port")).toEqual({ found: true, encrypted: false, value: "8080" });
		expect(JSON.parse(readFileSync(configPath, "utf8")).port).toBe(8080);
	});

	it("lists keys with their kinds", () => {
		runConfigSet("host", "bridge.local");
		runConfigSet("password", "test-secret");

		expect(runConfigList()).toEqual({
			filePath: configPath,
			entries: [
				{ key: "host", kind: "string", encrypted: false },
				{ key: "password", kind: "encrypted", encrypted: true },
			],
		});
	});

	it("removes keys", () => {
		runConfigSet("host", "bridge.local");

		expect(runConfigUnset("host")).toBe(true);
		expect(runConfigUnset("host")).toBe(false);
		expect(runConfigGet("host")).toEqual({ found: false });
	});

	it("validates the stored configuration", () => {
		expect(runConfigValidate()).toEqual({
			filePath: configPath,
			found: false,
			issues: ["host is required", "port is required", "username is required"],
		});

		runConfigSet("host", "bridge.local");
		runConfigSet("port", "70000", { type: "int" });
		runConfigSet("username", "alice");

		expect(runConfigValidate()).toEqual({
			filePath: configPath,
			found: true,
			issues: ["port must be an integer between 1 and 65535"],
		});
	});
});
