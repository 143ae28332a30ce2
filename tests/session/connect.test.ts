import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => {
	const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
	return { getLazyChildLogger: () => () => logger };
});

import { ConfigStore } from "../../src/config/store.js";
import { AuthError, ConfigIncompleteError } from "../../src/errors.js";
import type { FetchLike } from "../../src/infra/http.js";
import { connect } from "../../src/session/connect.js";

const KEY = Buffer.alloc(32, 0x7e);
const START = Date.UTC(2024, 5, 1);

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status });
}

describe("connect", () => {
	let dir: string;
	let store: ConfigStore;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "connect-"));
		store = new ConfigStore({ filePath: join(dir, "leviton.json"), key: KEY });
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	function fillStore(): void {
		store.set("host", "bridge.local");
		store.set("port", 8080);
		store.set("username", "test-user");
		store.set("password", "test-secret", true);
		store.set("api_base_url", "http://api.test/api");
	}

	it("logs in with the decrypted password and returns a working client", async () => {
		fillStore();
		const fetchImpl = vi.fn<FetchLike>(async (url) =>
			url.endsWith("/user/login")
				? jsonResponse({ access_token: "abc123", expires_in: 3600 })
				: jsonResponse([{ id: "dev-1" }]),
		);

		const conn = await connect(store, { fetchImpl, now: () => START });

		expect(fetchImpl.mock.calls[0][1].body).toBe(
			'{"username":"test-user","password":"test-secret"}',
		);
		expect(conn.login).toEqual({ accessToken: "abc123", expiresIn: 3600, expiresAt: START + 3_600_000 });
		expect(conn.session.state).toBe("authenticated");
		expect(conn.settings.host).toBe("bridge.local");

		await expect(conn.client.listDevices()).resolves.toEqual([{ id: "dev-1" }]);
		expect(fetchImpl.mock.calls[1][0]).toBe("http://api.test/api/devices");
	});

	it("refuses to log in without a password", async () => {
		store.set("host", "bridge.local");
		store.set("port", 8080);
		store.set("username", "test-user");
		const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({}));

		await expect(connect(store, { fetchImpl })).rejects.toThrow(
			`Configuration in ${store.filePath} is incomplete: password is required`,
		);
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it("lists every missing setting", async () => {
		const error = await connect(store, { fetchImpl: async () => jsonResponse({}) }).catch(
			(err: unknown) => err,
		);

		expect(error).toBeInstanceOf(ConfigIncompleteError);
		if (error instanceof ConfigIncompleteError) {
			expect(error.code).toBe("CONFIG_INCOMPLETE");
			expect(error.filePath).toBe(store.filePath);
			expect(error.issues).toEqual([
				"host is required",
				"port is required",
				"username is required",
				"password is required",
			]);
			expect(error.message).toBe(
				`Configuration in ${store.filePath} is incomplete: host is required; port is required; username is required; password is required`,
			);
		}
	});

	it("surfaces login failures", async () => {
		fillStore();

		await expect(
			connect(store, { fetchImpl: async () => jsonResponse({ error: "denied" }, 403) }),
		).rejects.toThrow(AuthError);
	});
});
