/**
 * Generic retry executor for device operations
 *
 * Runs an operation until it succeeds, fails fatally, the backoff policy
 * gives up, or the signal is aborted. While the readiness predicate is false
 * the operation is skipped (the client is mid-reconnect) and the skip does not
 * count against the policy's retry budget. A run whose target has been
 * abandoned (e.g. the client was replaced) ends as cancelled.
 */

import type { BackoffPolicy } from './backoff-policy';
import { ClientNotReadyError } from '../transport/errors';
import { OperationCancelledError, sleep } from '../utils/cancellation';
import { createOperationLogger, type OperationLogger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { silentLogger, type Logger } from '../logging/types';

export type OperationResult<T> =
	| { kind: 'success'; value: T }
	| { kind: 'transient'; error: unknown }
	| { kind: 'fatal'; error: unknown };

export type RetryOutcome<T> =
	| { status: 'succeeded'; value: T; attempts: number }
	| { status: 'failed'; error: unknown; attempts: number }
	| { status: 'cancelled'; attempts: number };

export type RetryableOperation<T> = (signal: AbortSignal) => Promise<OperationResult<T>>;

export interface RetryRunOptions<T> {
	/** Name used in log entries, e.g. 'SendTelemetry_12' */
	operationName: string;
	operation: RetryableOperation<T>;
	/** Whether the operation is currently actionable (default: always) */
	isReady?: () => boolean;
	/** Whether the run should stop because its target is gone (default: never) */
	isAbandoned?: () => boolean;
	signal: AbortSignal;
}

export const succeeded = <T>(value: T): OperationResult<T> => ({ kind: 'success', value });
export const transientFailure = <T>(error: unknown): OperationResult<T> => ({ kind: 'transient', error });
export const fatalFailure = <T>(error: unknown): OperationResult<T> => ({ kind: 'fatal', error });

/**
 * Run a throwing async call and tag its outcome using the given classifier.
 */
export async function attempt<T>(
	fn: () => Promise<T>,
	isTransient: (error: unknown) => boolean
): Promise<OperationResult<T>> {
	try {
		return succeeded(await fn());
	} catch (error) {
		return isTransient(error) ? transientFailure(error) : fatalFailure(error);
	}
}

/**
 * Turn an outcome back into a value, throwing for failures.
 * A cancelled run throws OperationCancelledError.
 */
export function unwrapOutcome<T>(outcome: RetryOutcome<T>, operationName: string): T {
	switch (outcome.status) {
		case 'succeeded':
			return outcome.value;
		case 'failed':
			throw outcome.error;
		case 'cancelled':
			throw new OperationCancelledError(`${operationName} cancelled after ${outcome.attempts} attempt(s)`);
	}
}

export class RetryExecutor {
	private readonly logger: Logger;
	private readonly ops: OperationLogger;

	constructor(
		private readonly policy: BackoffPolicy,
		logger?: Logger
	) {
		this.logger = logger ?? silentLogger;
		this.ops = createOperationLogger(this.logger);
	}

	/**
	 * Classifier of the underlying policy, for use with `attempt()`.
	 */
	isTransient = (error: unknown): boolean => this.policy.isTransient(error);

	async run<T>(options: RetryRunOptions<T>): Promise<RetryOutcome<T>> {
		const { operationName, operation, signal } = options;
		const isReady = options.isReady ?? (() => true);
		const isAbandoned = options.isAbandoned ?? (() => false);

		let failures = 0;
		let attempts = 0;

		while (!signal.aborted) {
			let lastFailure: unknown;

			if (isAbandoned()) {
				this.logger.debug(`${operationName}: abandoned`, {
					component: LogComponents.RETRY,
					operation: operationName,
					attempts,
				});
				return { status: 'cancelled', attempts };
			}

			if (!isReady()) {
				this.logger.debug(`${operationName}: client not ready, skipping this attempt`, {
					component: LogComponents.RETRY,
					operation: operationName,
					failures,
				});
				lastFailure = new ClientNotReadyError(operationName);
			} else {
				attempts++;
				this.ops.start(operationName, `Attempt ${attempts} started`, {
					component: LogComponents.RETRY,
					attempt: attempts,
				});

				let result: OperationResult<T>;
				try {
					result = await operation(signal);
				} catch (error) {
					result = fatalFailure(error);
				}

				if (result.kind === 'success') {
					this.ops.complete(operationName, `Attempt ${attempts} succeeded`, {
						component: LogComponents.RETRY,
						attempt: attempts,
					});
					return { status: 'succeeded', value: result.value, attempts };
				}

				if (signal.aborted) {
					break;
				}

				if (result.kind === 'fatal') {
					this.ops.error(operationName, `Attempt ${attempts} failed with a non-retriable error`, result.error, {
						component: LogComponents.RETRY,
						attempt: attempts,
					});
					return { status: 'failed', error: result.error, attempts };
				}

				lastFailure = result.error;
				this.logger.warn(`${operationName}: attempt ${attempts} failed with a transient error`, {
					component: LogComponents.RETRY,
					operation: operationName,
					attempt: attempts,
					error: lastFailure instanceof Error ? lastFailure.message : String(lastFailure),
				});
			}

			const decision = this.policy.shouldRetry(failures, lastFailure);
			if (!decision.retry) {
				this.logger.warn(`${operationName}: giving up after ${attempts} attempt(s)`, {
					component: LogComponents.RETRY,
					operation: operationName,
					attempts,
				});
				return { status: 'failed', error: lastFailure, attempts };
			}

			// Skipped attempts only borrow a delay from the policy
			if (!(lastFailure instanceof ClientNotReadyError)) {
				failures++;
			}

			const elapsed = await sleep(decision.delayMs, signal);
			if (!elapsed) {
				break;
			}
		}

		this.logger.debug(`${operationName}: cancelled`, {
			component: LogComponents.RETRY,
			operation: operationName,
			attempts,
		});
		return { status: 'cancelled', attempts };
	}
}
