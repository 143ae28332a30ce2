import { describe, expect, it } from "vitest";

import { TokenSlot } from "../../src/session/token-slot.js";

describe("TokenSlot", () => {
	it("starts empty", () => {
		expect(new TokenSlot().snapshot()).toBeNull();
	});

	it("stores a frozen copy of the pair", () => {
		const slot = new TokenSlot();
		const input = { token: "abc123", expiresAt: 1_000 };

		slot.replace(input);
		input.token = "changed";

		const snapshot = slot.snapshot();
		expect(snapshot).toEqual({ token: "abc123", expiresAt: 1_000 });
		expect(Object.isFrozen(snapshot)).toBe(true);
	});

	it("hands out the same snapshot until replaced", () => {
		const slot = new TokenSlot();
		slot.replace({ token: "one", expiresAt: 1 });
		const first = slot.snapshot();

		slot.replace({ token: "two", expiresAt: 2 });

		expect(first).toEqual({ token: "one", expiresAt: 1 });
		expect(slot.snapshot()).toEqual({ token: "two", expiresAt: 2 });
	});

	it("clears with null", () => {
		const slot = new TokenSlot();
		slot.replace({ token: "one", expiresAt: 1 });
		slot.replace(null);
		expect(slot.snapshot()).toBeNull();
	});
});
