import { describe, expect, it } from "vitest";

import {
	fromScalar,
	fromStored,
	parseBoolean,
	parseInteger,
	StoredConfigSchema,
	scalarToString,
	toStored,
} from "../../src/config/values.js";

describe("fromScalar", () => {
	it("tags strings, integers and booleans", () => {
		expect(fromScalar("example.local")).toEqual({ kind: "string", value: "example.local" });
		expect(fromScalar(8080)).toEqual({ kind: "int", value: 8080 });
		expect(fromScalar(false)).toEqual({ kind: "bool", value: false });
	});

	it("rejects numbers that are not safe integers", () => {
		expect(() => fromScalar(1.5)).toThrow(RangeError);
		expect(() => fromScalar(Number.NaN)).toThrow("Config numbers must be safe integers, got NaN");
	});
});

describe("stored form", () => {
	it("keeps plain values as bare scalars", () => {
		expect(toStored({ kind: "int", value: 443 })).toBe(443);
		expect(toStored({ kind: "string", value: "alice" })).toBe("alice");
	});

	it("nests encrypted values", () => {
		expect(toStored({ kind: "encrypted", blob: "QUJD" })).toEqual({
			isEncrypted: true,
			value: "QUJD",
		});
		expect(fromStored({ isEncrypted: true, value: "QUJD" })).toEqual({
			kind: "encrypted",
			blob: "QUJD",
		});
	});

	it("accepts a mixed config object", () => {
		const result = StoredConfigSchema.safeParse({
			host: "bridge.local",
			port: 8080,
			use_ssl: true,
			password: { isEncrypted: true, value: "QUJD" },
		});
		expect(result.success).toBe(true);
	});

	it.each([
		["a fractional number", { port: 80.5 }],
		["null", { host: null }],
		["an array", { hosts: ["a"] }],
		["isEncrypted false", { password: { isEncrypted: false, value: "x" } }],
		["extra fields on an encrypted entry", { password: { isEncrypted: true, value: "x", iv: "y" } }],
	])("rejects %s", (_label, value) => {
		expect(StoredConfigSchema.safeParse(value).success).toBe(false);
	});
});

describe("scalarToString", () => {
	it("stringifies non-strings", () => {
		expect(scalarToString(42)).toBe("42");
		expect(scalarToString(true)).toBe("true");
		expect(scalarToString("x")).toBe("x");
	});
});

describe("parseInteger", () => {
	it.each([
		["8080", 8080],
		[" 42 ", 42],
		["-7", -7],
		["+3", 3],
	])("parses %j", (input, expected) => {
		expect(parseInteger(input)).toBe(expected);
	});

	it.each(["", "12.5", "0x10", "80a", "1e3", "99999999999999999999"])("rejects %j", (input) => {
		expect(parseInteger(input)).toBeUndefined();
	});
});

describe("parseBoolean", () => {
	it("is case-insensitive and trims", () => {
		expect(parseBoolean("TRUE")).toBe(true);
		expect(parseBoolean(" false ")).toBe(false);
	});

	it("rejects anything else", () => {
		expect(parseBoolean("yes")).toBeUndefined();
		expect(parseBoolean("1")).toBeUndefined();
	});
});
