import { DeviceClientError } from '../transport/errors';
import { isRetryableNetworkError, getNetworkErrorType } from '../utils/network-errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';

export interface BackoffDecision {
	retry: boolean;
	delayMs: number;
}

/**
 * Decides whether a failed operation should run again, and after how long.
 */
export interface BackoffPolicy {
	/**
	 * @param attemptIndex Zero-based count of failures before this one
	 * @param lastFailure The error that caused this failure
	 */
	shouldRetry(attemptIndex: number, lastFailure: unknown): BackoffDecision;

	isTransient(error: unknown): boolean;
}

export type ErrorClass = new (...args: never[]) => Error;

export interface ExponentialBackoffOptions {
	/** Failures tolerated before giving up (default: unbounded) */
	maxRetries?: number;
	/** Cap on the exponent, bounds the base delay at 2^maxExponent ms (default: 20, ~17 minutes) */
	maxExponent?: number;
	/** Jitter half-width in ms; jitter is drawn from [-jitterMs, +jitterMs) (default: 1000) */
	jitterMs?: number;
	/** Error types retried even though they are not transient by themselves */
	retryableErrors?: ErrorClass[];
	/** Uniform source in [0, 1) */
	random?: () => number;
	logger?: Logger;
}

export const DEFAULT_MAX_EXPONENT = 20;
export const DEFAULT_JITTER_MS = 1000;

/**
 * Jittered exponential backoff:
 * `delay = |2^min(attempt, maxExponent) + jitter|` milliseconds.
 *
 * The absolute value keeps early attempts (where jitter dominates the 1-2ms
 * base) from going negative.
 */
export class ExponentialBackoffPolicy implements BackoffPolicy {
	private readonly maxRetries: number;
	private readonly maxExponent: number;
	private readonly jitterMs: number;
	private readonly retryableErrors: ErrorClass[];
	private readonly random: () => number;
	private readonly logger?: Logger;

	constructor(options: ExponentialBackoffOptions = {}) {
		this.maxRetries = options.maxRetries ?? Number.MAX_SAFE_INTEGER;
		this.maxExponent = options.maxExponent ?? DEFAULT_MAX_EXPONENT;
		this.jitterMs = options.jitterMs ?? DEFAULT_JITTER_MS;
		this.retryableErrors = options.retryableErrors ?? [];
		this.random = options.random ?? Math.random;
		this.logger = options.logger;

		if (this.maxExponent < 0 || this.maxExponent > 30) {
			throw new RangeError(`maxExponent must be between 0 and 30, got ${this.maxExponent}`);
		}
	}

	shouldRetry(attemptIndex: number, lastFailure: unknown): BackoffDecision {
		if (attemptIndex >= this.maxRetries) {
			this.logger?.warn(`Retry budget exhausted after ${attemptIndex} attempts`, {
				component: LogComponents.BACKOFF,
				attempt: attemptIndex,
				maxRetries: this.maxRetries,
				reason: describeFailure(lastFailure),
			});
			return { retry: false, delayMs: 0 };
		}

		if (!this.isTransient(lastFailure)) {
			this.logger?.debug('Failure is not transient, not retrying', {
				component: LogComponents.BACKOFF,
				attempt: attemptIndex,
				reason: describeFailure(lastFailure),
			});
			return { retry: false, delayMs: 0 };
		}

		const delayMs = this.computeDelay(attemptIndex);
		this.logger?.info(`Retry attempt ${attemptIndex + 1} scheduled in ${delayMs}ms`, {
			component: LogComponents.BACKOFF,
			attempt: attemptIndex,
			delayMs,
			reason: describeFailure(lastFailure),
			errorType: getNetworkErrorType(lastFailure),
		});

		return { retry: true, delayMs };
	}

	isTransient(error: unknown): boolean {
		if (error instanceof DeviceClientError && error.isTransient) {
			return true;
		}

		if (isRetryableNetworkError(error)) {
			return true;
		}

		return this.retryableErrors.some(type => error instanceof type);
	}

	computeDelay(attemptIndex: number): number {
		const exponent = Math.min(Math.max(attemptIndex, 0), this.maxExponent);
		const jitter = Math.floor(this.random() * 2 * this.jitterMs) - this.jitterMs;
		return Math.abs(2 ** exponent + jitter);
	}
}

function describeFailure(error: unknown): string {
	if (error instanceof Error) {
		return `${error.name}: ${error.message}`;
	}
	return String(error);
}
