/**
 * Device client errors
 *
 * `isTransient` tells the backoff policy whether retrying the same call later
 * can succeed without any other intervention.
 */

export class DeviceClientError extends Error {
	readonly isTransient: boolean;

	constructor(message: string, options: { isTransient?: boolean; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = 'DeviceClientError';
		this.isTransient = options.isTransient ?? false;
	}
}

/**
 * The hub rejected the credential (bad key, expired token).
 */
export class UnauthorizedError extends DeviceClientError {
	constructor(message: string = 'Unauthorized', cause?: unknown) {
		super(message, { cause });
		this.name = 'UnauthorizedError';
	}
}

/**
 * The device identity exists but has been disabled at the hub.
 */
export class DeviceDisabledError extends DeviceClientError {
	constructor(message: string = 'Device is disabled', cause?: unknown) {
		super(message, { cause });
		this.name = 'DeviceDisabledError';
	}
}

export class ClientNotConnectedError extends DeviceClientError {
	constructor(operation: string) {
		super(`Client is not connected; cannot ${operation}`, { isTransient: true });
		this.name = 'ClientNotConnectedError';
	}
}

/**
 * Raised for an operation skipped because the client is mid-reconnect.
 */
export class ClientNotReadyError extends DeviceClientError {
	constructor(operation: string) {
		super(`Client is currently reconnecting; ${operation} will be attempted later`, { isTransient: true });
		this.name = 'ClientNotReadyError';
	}
}

export class OperationTimeoutError extends DeviceClientError {
	constructor(operation: string, timeoutMs: number) {
		super(`${operation} timed out after ${timeoutMs}ms`, { isTransient: true });
		this.name = 'OperationTimeoutError';
	}
}

/**
 * Non-success status returned by the hub for a twin request.
 */
export class TwinRequestError extends DeviceClientError {
	readonly status: number;

	constructor(status: number, message?: string) {
		// Throttling and server-side failures clear up on their own
		super(message ?? `Twin request failed with status ${status}`, {
			isTransient: status === 429 || status >= 500,
		});
		this.name = 'TwinRequestError';
		this.status = status;
	}
}
