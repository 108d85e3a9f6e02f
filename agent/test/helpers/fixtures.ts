/**
 * Test Fixtures for the Device Core
 * =================================
 *
 * Reusable factory functions for creating test data.
 *
 * Usage:
 *   const credentials = createCredentials('key1', 'key2');
 *   const { context, logger } = createTestContext({ credentials });
 */

import { createDeviceContext, type DeviceContext, type DeviceContextOptions } from '../../src/context';
import { ExponentialBackoffPolicy } from '../../src/retry/backoff-policy';
import { UnauthorizedError } from '../../src/transport/errors';
import type { DeviceCredential } from '../../src/transport/types';
import { createMockLogger, type MockLogger } from './mock-logger';

export const TEST_DEVICE_ID = 'device-1';
export const TEST_BROKER_URL = 'mqtt://broker.test:1883';

export const createCredential = (label: string = 'key1', sharedAccessKey: string = 'test-secret'): DeviceCredential => ({
	label,
	deviceId: TEST_DEVICE_ID,
	brokerUrl: TEST_BROKER_URL,
	sharedAccessKey,
});

export const createCredentials = (...labels: string[]): DeviceCredential[] =>
	(labels.length > 0 ? labels : ['key1']).map(label => createCredential(label, `test-secret-${label}`));

/**
 * Backoff without jitter and with tiny delays (1, 2, 4ms), so retry loops
 * finish quickly on real timers.
 */
export const createFastBackoffPolicy = (maxRetries?: number): ExponentialBackoffPolicy =>
	new ExponentialBackoffPolicy({
		maxRetries,
		maxExponent: 2,
		jitterMs: 0,
		retryableErrors: [UnauthorizedError],
	});

export interface TestContext {
	context: DeviceContext;
	logger: MockLogger;
}

export function createTestContext(overrides: Partial<DeviceContextOptions> = {}): TestContext {
	const logger = createMockLogger();
	const context = createDeviceContext({
		logger,
		credentials: createCredentials(),
		backoffPolicy: createFastBackoffPolicy(),
		...overrides,
	});
	return { context, logger };
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (error: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

export const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));
