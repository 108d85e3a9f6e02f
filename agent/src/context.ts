/**
 * Device Context
 * ==============
 *
 * State shared by every component of the device application, created once at
 * startup and passed by argument: the current client, the twin watermark,
 * the credential candidates, the process-wide cancellation controller, the
 * retry executor, the background task tracker and the logger.
 */

import { ClientSlot } from './lifecycle/client-slot';
import { CredentialSet } from './lifecycle/credential-set';
import { BackgroundTasks } from './lifecycle/background-tasks';
import { TwinVersionWatermark } from './twin/version-watermark';
import { ExponentialBackoffPolicy, type BackoffPolicy } from './retry/backoff-policy';
import { RetryExecutor } from './retry/retry-executor';
import { UnauthorizedError } from './transport/errors';
import type { DeviceCredential } from './transport/types';
import type { Logger } from './logging/types';

export interface DeviceContext {
	readonly logger: Logger;
	readonly client: ClientSlot;
	readonly credentials: CredentialSet<DeviceCredential>;
	readonly watermark: TwinVersionWatermark;
	readonly cancellation: AbortController;
	readonly retry: RetryExecutor;
	readonly tasks: BackgroundTasks;
}

export interface DeviceContextOptions {
	logger: Logger;
	credentials: readonly DeviceCredential[];
	/** Defaults to an unbounded jittered exponential policy */
	backoffPolicy?: BackoffPolicy;
	maxRetryExponent?: number;
	maxOperationRetries?: number;
	cancellation?: AbortController;
	initialDesiredVersion?: number;
}

export function createDeviceContext(options: DeviceContextOptions): DeviceContext {
	const policy = options.backoffPolicy ?? new ExponentialBackoffPolicy({
		maxExponent: options.maxRetryExponent,
		maxRetries: options.maxOperationRetries,
		// Unauthorized is resolved by the status-change handler re-initializing
		// the client, so operations keep retrying instead of giving up on it.
		retryableErrors: [UnauthorizedError],
		logger: options.logger,
	});

	return {
		logger: options.logger,
		client: new ClientSlot(),
		credentials: new CredentialSet(options.credentials),
		watermark: new TwinVersionWatermark(options.initialDesiredVersion),
		cancellation: options.cancellation ?? new AbortController(),
		retry: new RetryExecutor(policy, options.logger),
		tasks: new BackgroundTasks(options.logger),
	};
}
