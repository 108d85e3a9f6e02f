/**
 * Cancellation helpers built on AbortController/AbortSignal.
 *
 * One process-wide controller is created by the application and its signal is
 * passed by argument to every blocking call.
 */

export class OperationCancelledError extends Error {
	constructor(message: string = 'Operation cancelled') {
		super(message);
		this.name = 'OperationCancelledError';
	}
}

/**
 * True for errors that mean "we are shutting down", which callers swallow.
 */
export function isCancellation(error: unknown): boolean {
	if (error instanceof OperationCancelledError) {
		return true;
	}
	return error instanceof Error && error.name === 'AbortError';
}

/**
 * Wait for `ms`, or until the signal aborts.
 * @returns true if the full delay elapsed, false if it was cut short
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) {
		return Promise.resolve(false);
	}

	return new Promise<boolean>((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve(true);
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Abort-on-timeout controller, optionally chained to a parent signal.
 * The caller must call `dispose()` once the bounded work is over.
 */
export function createTimeoutController(
	timeoutMs: number,
	parent?: AbortSignal
): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController();
	const timer = setTimeout(() => {
		controller.abort(new OperationCancelledError(`Timed out after ${timeoutMs}ms`));
	}, timeoutMs);

	const onParentAbort = () => controller.abort(parent?.reason);
	if (parent?.aborted) {
		controller.abort(parent.reason);
	} else {
		parent?.addEventListener('abort', onParentAbort, { once: true });
	}

	return {
		signal: controller.signal,
		dispose: () => {
			clearTimeout(timer);
			parent?.removeEventListener('abort', onParentAbort);
		},
	};
}
