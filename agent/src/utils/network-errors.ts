/**
 * Network error classification utilities
 * Used by the backoff policy to decide whether a failure is transient
 */

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const REFUSED_CODES = new Set(['ECONNREFUSED']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'EPIPE', 'ECONNABORTED']);
const UNREACHABLE_CODES = new Set(['ENETUNREACH', 'EHOSTUNREACH', 'ENETDOWN']);

/**
 * Collect the `code` of the error and of every error in its `cause` chain.
 * Node socket errors carry the code directly, fetch/undici wrap it in `cause`.
 */
function errorCodes(error: unknown): string[] {
	const codes: string[] = [];
	let current: unknown = error;
	let depth = 0;

	while (current && typeof current === 'object' && depth < 5) {
		if ('code' in current && typeof current.code === 'string') {
			codes.push(current.code);
		}
		current = 'cause' in current ? current.cause : undefined;
		depth++;
	}

	return codes;
}

function hasCode(error: unknown, codes: Set<string>): boolean {
	return errorCodes(error).some(code => codes.has(code));
}

function message(error: unknown): string {
	return error instanceof Error ? error.message.toLowerCase() : '';
}

/**
 * DNS resolution errors
 */
export function isDnsError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (hasCode(error, DNS_CODES)) {
		return true;
	}

	const msg = message(error);
	return msg.includes('getaddrinfo') &&
		(msg.includes('enotfound') || msg.includes('eai_again'));
}

/**
 * Connection refused (broker down/unreachable)
 */
export function isConnectionRefused(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	return hasCode(error, REFUSED_CODES) || message(error).includes('econnrefused');
}

/**
 * Timeout and reset errors
 */
export function isTimeout(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	return hasCode(error, TIMEOUT_CODES) || message(error).includes('timeout');
}

/**
 * Network unreachable
 */
export function isNetworkUnreachable(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (hasCode(error, UNREACHABLE_CODES)) {
		return true;
	}

	const msg = message(error);
	return msg.includes('network unreachable') || msg.includes('host unreachable');
}

/**
 * Check if error is ANY retryable network error
 */
export function isRetryableNetworkError(error: unknown): boolean {
	return isDnsError(error) ||
		isConnectionRefused(error) ||
		isTimeout(error) ||
		isNetworkUnreachable(error);
}

export type NetworkErrorType = 'DNS_ERROR' | 'CONNECTION_REFUSED' | 'TIMEOUT' | 'NETWORK_UNREACHABLE' | 'UNKNOWN';

/**
 * Get human-readable error type
 */
export function getNetworkErrorType(error: unknown): NetworkErrorType {
	if (isDnsError(error)) return 'DNS_ERROR';
	if (isConnectionRefused(error)) return 'CONNECTION_REFUSED';
	if (isTimeout(error)) return 'TIMEOUT';
	if (isNetworkUnreachable(error)) return 'NETWORK_UNREACHABLE';
	return 'UNKNOWN';
}
