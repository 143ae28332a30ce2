/**
 * Promise-based mutex.
 *
 * Waiters are resumed in FIFO order. `withLock` releases on every exit path,
 * including when the critical section throws.
 */
export class Mutex {
	private locked = false;
	private queue: Array<() => void> = [];

	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}

		return new Promise((resolve) => {
			this.queue.push(resolve);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			// Ownership passes straight to the next waiter; `locked` stays true.
			next();
		} else {
			this.locked = false;
		}
	}

	get isLocked(): boolean {
		return this.locked;
	}

	get pending(): number {
		return this.queue.length;
	}

	async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
