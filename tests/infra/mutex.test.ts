import { describe, expect, it } from "vitest";

import { Mutex } from "../../src/infra/mutex.js";

describe("Mutex", () => {
	it("runs critical sections one at a time in FIFO order", async () => {
		const mutex = new Mutex();
		const events: string[] = [];

		const section = (name: string) =>
			mutex.withLock(async () => {
				events.push(`${name}:start`);
				await new Promise((resolve) => setTimeout(resolve, 5));
				events.push(`${name}:end`);
			});

		await Promise.all([section("a"), section("b"), section("c")]);

		expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
	});

	it("tracks lock state and waiters", async () => {
		const mutex = new Mutex();
		expect(mutex.isLocked).toBe(false);

		await mutex.acquire();
		const waiter = mutex.acquire();

		expect(mutex.isLocked).toBe(true);
		expect(mutex.pending).toBe(1);

		mutex.release();
		await waiter;
		expect(mutex.isLocked).toBe(true);
		expect(mutex.pending).toBe(0);

		mutex.release();
		expect(mutex.isLocked).toBe(false);
	});

	it("releases when the critical section throws", async () => {
		const mutex = new Mutex();

		await expect(
			mutex.withLock(() => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(mutex.isLocked).toBe(false);
		await expect(mutex.withLock(() => 42)).resolves.toBe(42);
	});
});
