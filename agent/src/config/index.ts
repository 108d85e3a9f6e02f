/**
 * Configuration Module
 * ====================
 *
 * Loads device settings from the environment (and a `.env` file, when
 * present) and validates them with zod. Every issue is reported at once.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConnectionStatusChangeReason } from '../transport/connection-state';
import type { DeviceCredential } from '../transport/types';
import { DEFAULT_MAX_EXPONENT } from '../retry/backoff-policy';
import {
	DEFAULT_CLOSE_TIMEOUT_MS,
	DEFAULT_REINITIALIZE_ON,
	type RecoverableDisconnectReason,
} from '../lifecycle/connection-lifecycle-manager';
import { DEFAULT_TELEMETRY_INTERVAL_MS } from '../telemetry/telemetry-publisher';

export class ConfigurationError extends Error {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
		this.name = 'ConfigurationError';
	}
}

const commaList = (value: string) => value.split(',').map(item => item.trim()).filter(item => item.length > 0);

const optionalInt = (min: number, max?: number) => {
	const base = z.coerce.number().int().min(min);
	return (max === undefined ? base : base.max(max)).optional();
};

const ReinitializeReasonSchema = z.enum([
	ConnectionStatusChangeReason.RETRY_EXPIRED,
	ConnectionStatusChangeReason.COMMUNICATION_ERROR,
]);

const EnvSchema = z.object({
	MQTT_BROKER_URL: z.string().url(),
	DEVICE_ID: z.string().min(1),
	DEVICE_KEYS: z.string()
		.transform(commaList)
		.pipe(z.array(z.string()).min(1, 'DEVICE_KEYS must list at least one key')),
	APP_RUNNING_TIME_SECONDS: optionalInt(1),
	TELEMETRY_INTERVAL_MS: optionalInt(1),
	MAX_RETRY_EXPONENT: optionalInt(0, 30),
	MAX_OPERATION_RETRIES: optionalInt(0),
	REINITIALIZE_ON: z.string()
		.transform(commaList)
		.pipe(z.array(ReinitializeReasonSchema))
		.optional(),
	TRANSPORT_MAX_RECONNECT_ATTEMPTS: optionalInt(0),
	TRANSPORT_RECONNECT_PERIOD_MS: optionalInt(1),
	CONNECT_TIMEOUT_MS: optionalInt(1),
	OPERATION_TIMEOUT_MS: optionalInt(1),
	CLOSE_TIMEOUT_MS: optionalInt(1),
	LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
	LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
});

export interface DeviceConfig {
	credentials: DeviceCredential[];
	/** Undefined means run until interrupted */
	runningTimeMs?: number;
	telemetryIntervalMs: number;
	maxRetryExponent: number;
	/** Undefined means retry transient failures without limit */
	maxOperationRetries?: number;
	reinitializeOn: RecoverableDisconnectReason[];
	transport: {
		maxReconnectAttempts: number;
		reconnectPeriodMs: number;
		connectTimeoutMs: number;
		operationTimeoutMs: number;
	};
	closeTimeoutMs: number;
	logLevel: 'error' | 'warn' | 'info' | 'debug';
	logFormat: 'json' | 'pretty';
}

/**
 * Validate an environment map. Empty strings count as unset.
 */
export function parseConfig(env: NodeJS.ProcessEnv): DeviceConfig {
	const cleaned: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== '') {
			cleaned[key] = value.trim();
		}
	}

	const result = EnvSchema.safeParse(cleaned);
	if (!result.success) {
		throw new ConfigurationError(
			result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		);
	}

	const parsed = result.data;
	const credentials = parsed.DEVICE_KEYS.map((sharedAccessKey, index): DeviceCredential => ({
		label: `key${index + 1}`,
		deviceId: parsed.DEVICE_ID,
		brokerUrl: parsed.MQTT_BROKER_URL,
		sharedAccessKey,
	}));

	return {
		credentials,
		runningTimeMs: parsed.APP_RUNNING_TIME_SECONDS === undefined ? undefined : parsed.APP_RUNNING_TIME_SECONDS * 1000,
		telemetryIntervalMs: parsed.TELEMETRY_INTERVAL_MS ?? DEFAULT_TELEMETRY_INTERVAL_MS,
		maxRetryExponent: parsed.MAX_RETRY_EXPONENT ?? DEFAULT_MAX_EXPONENT,
		maxOperationRetries: parsed.MAX_OPERATION_RETRIES,
		reinitializeOn: parsed.REINITIALIZE_ON ?? [...DEFAULT_REINITIALIZE_ON],
		transport: {
			maxReconnectAttempts: parsed.TRANSPORT_MAX_RECONNECT_ATTEMPTS ?? 10,
			reconnectPeriodMs: parsed.TRANSPORT_RECONNECT_PERIOD_MS ?? 1000,
			connectTimeoutMs: parsed.CONNECT_TIMEOUT_MS ?? 10000,
			operationTimeoutMs: parsed.OPERATION_TIMEOUT_MS ?? 5000,
		},
		closeTimeoutMs: parsed.CLOSE_TIMEOUT_MS ?? DEFAULT_CLOSE_TIMEOUT_MS,
		logLevel: parsed.LOG_LEVEL,
		logFormat: parsed.LOG_FORMAT,
	};
}

/**
 * Load `.env` into process.env (existing variables win) and parse it.
 */
export function loadConfig(path?: string): DeviceConfig {
	dotenv.config({ path });
	return parseConfig(process.env);
}
