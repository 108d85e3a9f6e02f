import { OperationCancelledError } from './cancellation';

/**
 * Mutual-exclusion gate for async critical sections.
 *
 * Waiters are served in FIFO order. A waiter whose signal aborts leaves the
 * queue and rejects with OperationCancelledError without ever holding the lock.
 *
 * Example usage:
 * ```typescript
 * const lock = new AsyncLock();
 *
 * await lock.runExclusive(async () => {
 *   await replaceClient();
 * }, signal);
 * ```
 */
export class AsyncLock {
	private locked: boolean = false;
	private waiters: Array<() => void> = [];

	/**
	 * Wait until the lock is free and take it.
	 */
	acquire(signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(new OperationCancelledError('Lock acquisition cancelled'));
		}

		if (!this.locked) {
			this.locked = true;
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const onAbort = () => {
				this.waiters = this.waiters.filter(waiter => waiter !== grant);
				reject(new OperationCancelledError('Lock acquisition cancelled'));
			};

			const grant = () => {
				signal?.removeEventListener('abort', onAbort);
				resolve();
			};

			this.waiters.push(grant);
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	/**
	 * Release lock, handing it straight to the next waiter if there is one
	 */
	release(): void {
		const next = this.waiters.shift();
		if (next) {
			// Ownership passes directly; `locked` stays true
			next();
			return;
		}
		this.locked = false;
	}

	/**
	 * Execute function with lock protection
	 */
	async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		await this.acquire(signal);
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
