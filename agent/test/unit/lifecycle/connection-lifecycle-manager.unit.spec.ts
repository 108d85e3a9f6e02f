/**
 * Unit Tests: ConnectionLifecycleManager
 * ======================================
 *
 * Runs the manager against MockDeviceClient instances handed out by a
 * MockClientFactory. Status notifications are emitted by the tests and the
 * resulting background work is awaited with `context.tasks.drain()`.
 *
 * Test Categories:
 * 1. Initialization (double-checked guard, subscriptions)
 * 2. Status changes (decision table)
 * 3. Credential rotation and fatal termination
 * 4. Shutdown
 * 5. Operations caught by a reconnect
 */

import { stub } from 'sinon';
import {
	ConnectionLifecycleManager,
	type ConnectionLifecycleOptions,
} from '../../../src/lifecycle/connection-lifecycle-manager';
import { CredentialsExhaustedError, FatalConnectionError } from '../../../src/lifecycle/errors';
import { ConnectionStatus, ConnectionStatusChangeReason } from '../../../src/transport/connection-state';
import { DeviceDisabledError, UnauthorizedError } from '../../../src/transport/errors';
import { MessageAcknowledgement, type DesiredProperties, type IncomingMessage } from '../../../src/transport/types';
import { TwinReconciler } from '../../../src/twin/twin-reconciler';
import { DesiredPropertyUpdateHandler } from '../../../src/twin/desired-property-handler';
import { TelemetryPublisher } from '../../../src/telemetry/telemetry-publisher';
import type { DeviceContext } from '../../../src/context';
import { MockClientFactory, MockDeviceClient, createTwin } from '../../helpers/mock-device-client';
import { loggedMessages, type MockLogger } from '../../helpers/mock-logger';
import { createCredentials, createDeferred, createTestContext, delay } from '../../helpers/fixtures';

const { CONNECTED, DISCONNECTED, DISCONNECTED_RETRYING, DISABLED } = ConnectionStatus;
const { OK, BAD_CREDENTIAL, DEVICE_DISABLED, RETRY_EXPIRED, COMMUNICATION_ERROR } = ConnectionStatusChangeReason;

function nth(factory: MockClientFactory, index: number): MockDeviceClient {
	const client = factory.created[index];
	if (!client) {
		throw new Error(`Client #${index} was never created`);
	}
	return client;
}

describe('ConnectionLifecycleManager', () => {
	let context: DeviceContext;
	let logger: MockLogger;
	let factory: MockClientFactory;
	let manager: ConnectionLifecycleManager;
	let signal: AbortSignal;

	const messageHandler = stub<[IncomingMessage], Promise<MessageAcknowledgement>>();
	const desiredPropertyHandler = stub<[DesiredProperties], Promise<void>>();

	function createManager(overrides: Partial<ConnectionLifecycleOptions> = {}): ConnectionLifecycleManager {
		return new ConnectionLifecycleManager(context, {
			clientFactory: factory.create,
			twinReconciler: new TwinReconciler(context, new DesiredPropertyUpdateHandler(context)),
			messageHandler,
			desiredPropertyHandler,
			...overrides,
		});
	}

	beforeEach(() => {
		({ context, logger } = createTestContext({ credentials: createCredentials('key1', 'key2') }));
		signal = context.cancellation.signal;
		factory = new MockClientFactory();
		messageHandler.reset();
		messageHandler.resolves(MessageAcknowledgement.COMPLETE);
		desiredPropertyHandler.reset();
		desiredPropertyHandler.resolves();
		manager = createManager();
	});

	afterEach(async () => {
		context.cancellation.abort();
		await context.tasks.drain();
	});

	// ============================================================================
	// CATEGORY 1: Initialization
	// ============================================================================

	describe('initialize', () => {
		it('builds, opens and subscribes a client from the head credential', async () => {
			await manager.initialize(signal);

			const client = nth(factory, 0);
			expect(client.credential.label).toBe('key1');
			expect(client.open.calledOnce).toBe(true);
			expect(client.setMessageHandler.calledOnceWith(messageHandler)).toBe(true);
			expect(client.setDesiredPropertyUpdateHandler.calledOnceWith(desiredPropertyHandler)).toBe(true);
			expect(manager.getClient()).toBe(client);
			expect(manager.isClientReady()).toBe(true);
		});

		it('creates a single client when two callers race', async () => {
			await Promise.all([manager.initialize(signal), manager.initialize(signal)]);

			expect(factory.created).toHaveLength(1);
			expect(loggedMessages(logger, 'debug')).toContain('Client was initialized by a concurrent caller');
		});

		it('is a no-op while the current client is connected', async () => {
			await manager.initialize(signal);
			await manager.initialize(signal);

			expect(factory.created).toHaveLength(1);
			expect(nth(factory, 0).open.calledOnce).toBe(true);
		});

		it('reports the need for a client only for missing, disconnected or disabled ones', async () => {
			expect(manager.needsInitialization()).toBe(true);
			await manager.initialize(signal);
			const client = nth(factory, 0);

			expect(manager.needsInitialization()).toBe(false);
			client.setStatus(DISCONNECTED_RETRYING, COMMUNICATION_ERROR);
			expect(manager.needsInitialization()).toBe(false);
			client.setStatus(DISCONNECTED, RETRY_EXPIRED);
			expect(manager.needsInitialization()).toBe(true);
			client.setStatus(DISABLED, ConnectionStatusChangeReason.CLIENT_CLOSED);
			expect(manager.needsInitialization()).toBe(true);
		});

		it('retries a transient open failure', async () => {
			factory.configure = (client) => {
				client.open.onFirstCall().rejects(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
			};

			await manager.initialize(signal);

			expect(nth(factory, 0).open.calledTwice).toBe(true);
			expect(manager.isClientReady()).toBe(true);
		});

		it('propagates a non-transient open failure', async () => {
			factory.configure = (client) => {
				client.open.rejects(new Error('unsupported protocol'));
			};

			await expect(manager.initialize(signal)).rejects.toThrow('unsupported protocol');
		});
	});

	// ============================================================================
	// CATEGORY 2: Status changes
	// ============================================================================

	describe('status changes', () => {
		beforeEach(async () => {
			await manager.initialize(signal);
		});

		it('reconciles the twin when the client reports Connected', async () => {
			const client = nth(factory, 0);
			client.getTwin.resolves(createTwin(3, { brightness: 5 }));

			client.emitStatus(CONNECTED, OK);
			await context.tasks.drain();

			expect(client.getTwin.calledOnce).toBe(true);
			expect(client.updateReportedProperties.calledOnce).toBe(true);
			expect(client.updateReportedProperties.firstCall.args[0]).toEqual({ brightness: 5 });
			expect(context.watermark.current).toBe(3);
		});

		it('leaves a self-retrying client alone', async () => {
			const client = nth(factory, 0);

			client.emitStatus(DISCONNECTED_RETRYING, COMMUNICATION_ERROR);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(1);
			expect(client.close.notCalled).toBe(true);
			expect(client.open.calledOnce).toBe(true);
			expect(loggedMessages(logger, 'info')).toContain('Letting the client retry');
		});

		it.each([RETRY_EXPIRED, COMMUNICATION_ERROR])('replaces the client after Disconnected/%s', async (reason) => {
			const first = nth(factory, 0);

			first.emitStatus(DISCONNECTED, reason);
			await context.tasks.drain();

			const second = nth(factory, 1);
			expect(first.close.calledOnce).toBe(true);
			expect(second.credential.label).toBe('key1');
			expect(second.setMessageHandler.calledOnce).toBe(true);
			expect(second.setDesiredPropertyUpdateHandler.calledOnce).toBe(true);
			expect(context.credentials.size).toBe(2);
		});

		it('honours a narrower re-initialization policy', async () => {
			await manager.shutdown();
			manager = createManager({ reinitializeOn: [RETRY_EXPIRED] });
			await manager.initialize(signal);
			const client = nth(factory, 1);

			client.emitStatus(DISCONNECTED, COMMUNICATION_ERROR);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(2);
			expect(loggedMessages(logger, 'warn')).toContain('Not re-initializing the client for reason CommunicationError');
		});

		it('logs an unexpected combination and takes no action', async () => {
			nth(factory, 0).emitStatus(DISCONNECTED, OK);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(1);
			expect(loggedMessages(logger, 'error')).toContain(
				'Unexpected connection state, taking no action: status=Disconnected, reason=Ok, recommendation=OpenConnection'
			);
		});

		it('takes no action when the client reports Disabled', async () => {
			nth(factory, 0).emitStatus(DISABLED, ConnectionStatusChangeReason.CLIENT_CLOSED);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(1);
		});

		it('ignores notifications from a replaced client', async () => {
			const first = nth(factory, 0);
			first.emitStatus(DISCONNECTED, RETRY_EXPIRED);
			await context.tasks.drain();

			first.emitStatus(DISCONNECTED, BAD_CREDENTIAL);

			expect(context.tasks.size).toBe(0);
			expect(factory.created).toHaveLength(2);
			expect(context.credentials.size).toBe(2);
			expect(loggedMessages(logger, 'debug')).toContain('Ignoring status change from a superseded client');
		});

		it('ignores an unauthorized error while closing the old client', async () => {
			const first = nth(factory, 0);
			first.close.rejects(new UnauthorizedError('token expired'));

			first.emitStatus(DISCONNECTED, RETRY_EXPIRED);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(2);
			expect(manager.isClientReady()).toBe(true);
		});

		it('ends the application when closing the old client fails', async () => {
			const first = nth(factory, 0);
			const stuck = new Error('socket stuck');
			first.close.rejects(stuck);

			first.emitStatus(DISCONNECTED, RETRY_EXPIRED);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(1);
			expect(signal.reason).toBeInstanceOf(FatalConnectionError);
			expect(signal.reason).toMatchObject({
				message: 'Handling connection status Disconnected/RetryExpired failed: socket stuck',
				cause: stuck,
			});
		});

		it('ends the application when the replacement client cannot be opened', async () => {
			const refused = new Error('Connection refused: Unacceptable protocol version');
			factory.configure = (client) => {
				client.open.rejects(refused);
			};

			nth(factory, 0).emitStatus(DISCONNECTED, RETRY_EXPIRED);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(2);
			expect(nth(factory, 1).open.calledOnce).toBe(true);
			expect(manager.isClientReady()).toBe(false);
			expect(signal.aborted).toBe(true);
			expect(signal.reason).toBeInstanceOf(FatalConnectionError);
			expect(signal.reason).toMatchObject({ cause: refused });
			expect(loggedMessages(logger, 'error')).toContain(
				'Handling connection status Disconnected/RetryExpired failed: Connection refused: Unacceptable protocol version'
			);
		});
	});

	// ============================================================================
	// CATEGORY 3: Credentials
	// ============================================================================

	describe('credentials', () => {
		it('moves to the next credential on BadCredential and fails once none remain', async () => {
			await manager.initialize(signal);

			nth(factory, 0).emitStatus(DISCONNECTED, BAD_CREDENTIAL);
			await context.tasks.drain();

			const second = nth(factory, 1);
			expect(second.credential.label).toBe('key2');
			expect(context.credentials.size).toBe(1);
			expect(signal.aborted).toBe(false);

			second.emitStatus(DISCONNECTED, BAD_CREDENTIAL);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(2);
			expect(context.credentials.hasAny()).toBe(false);
			expect(signal.aborted).toBe(true);
			expect(signal.reason).toBeInstanceOf(CredentialsExhaustedError);
		});

		it('re-initializes N-1 times for N rejected credentials', async () => {
			({ context, logger } = createTestContext({ credentials: createCredentials('a', 'b', 'c') }));
			signal = context.cancellation.signal;
			manager = createManager();
			await manager.initialize(signal);

			for (let index = 0; index < 3; index++) {
				nth(factory, index).emitStatus(DISCONNECTED, BAD_CREDENTIAL);
				await context.tasks.drain();
			}

			expect(factory.created.map(client => client.credential.label)).toEqual(['a', 'b', 'c']);
			expect(signal.reason).toBeInstanceOf(CredentialsExhaustedError);
		});

		it('switches credential when the hub rejects it during open', async () => {
			factory.configure = (client) => {
				if (client.credential.label !== 'key1') {
					return;
				}
				client.open.callsFake(async () => {
					client.emitStatus(DISCONNECTED, BAD_CREDENTIAL);
					throw new UnauthorizedError('bad key');
				});
			};

			await manager.initialize(signal);
			await context.tasks.drain();

			const [first, second] = [nth(factory, 0), nth(factory, 1)];
			expect(first.open.calledOnce).toBe(true);
			expect(first.setMessageHandler.notCalled).toBe(true);
			expect(second.credential.label).toBe('key2');
			expect(second.setMessageHandler.calledOnce).toBe(true);
			expect(manager.isClientReady()).toBe(true);
		});

		it('ends the application when the device is disabled', async () => {
			await manager.initialize(signal);

			nth(factory, 0).emitStatus(DISCONNECTED, DEVICE_DISABLED);
			await context.tasks.drain();

			expect(factory.created).toHaveLength(1);
			expect(signal.reason).toBeInstanceOf(FatalConnectionError);
			expect(signal.reason).not.toBeInstanceOf(CredentialsExhaustedError);
			expect(loggedMessages(logger, 'error')).toContain('The device has been disabled at the hub; enable it and restart');
		});

		it('ends the application when the device is disabled during open', async () => {
			factory.configure = (client) => {
				client.open.callsFake(async () => {
					client.emitStatus(DISCONNECTED, DEVICE_DISABLED);
					throw new DeviceDisabledError();
				});
			};

			await expect(manager.initialize(signal)).rejects.toThrow('OpenConnection cancelled after 1 attempt(s)');
			expect(signal.reason).toBeInstanceOf(FatalConnectionError);
		});
	});

	// ============================================================================
	// CATEGORY 4: Shutdown
	// ============================================================================

	describe('shutdown', () => {
		it('closes the client once with a signal of its own', async () => {
			await manager.initialize(signal);
			const client = nth(factory, 0);
			context.cancellation.abort();

			await Promise.all([manager.shutdown(), manager.shutdown()]);

			expect(client.close.calledOnce).toBe(true);
			const closeSignal = client.close.firstCall.args[0];
			expect(closeSignal).toBeDefined();
			expect(closeSignal?.aborted).toBe(false);
			expect(loggedMessages(logger, 'info')).toContain('Closed the client');
		});

		it('waits for an in-flight replacement instead of closing its client twice', async () => {
			await manager.initialize(signal);
			const first = nth(factory, 0);
			const closeReleased = createDeferred();
			first.close.callsFake(async () => {
				await closeReleased.promise;
				first.setStatus(DISABLED, ConnectionStatusChangeReason.CLIENT_CLOSED);
			});

			first.emitStatus(DISCONNECTED, RETRY_EXPIRED);
			await delay(5);
			context.cancellation.abort();
			const stopping = manager.shutdown();
			closeReleased.resolve();
			await Promise.all([stopping, context.tasks.drain()]);

			expect(first.close.calledOnce).toBe(true);
			expect(factory.created).toHaveLength(2);
			expect(nth(factory, 1).close.calledOnce).toBe(true);
			expect(loggedMessages(logger, 'info')).toContain('Closed the client');
		});

		it('stops reacting to status changes afterwards', async () => {
			await manager.initialize(signal);
			const client = nth(factory, 0);
			await manager.shutdown();

			client.emitStatus(DISCONNECTED, RETRY_EXPIRED);

			expect(context.tasks.size).toBe(0);
			expect(manager.needsInitialization()).toBe(false);
		});

		it('logs a failed close instead of throwing', async () => {
			await manager.initialize(signal);
			nth(factory, 0).close.rejects(new Error('close failed'));

			await manager.shutdown();

			expect(loggedMessages(logger, 'warn')).toContain('Failed to close the client cleanly');
		});
	});

	// ============================================================================
	// CATEGORY 5: Operations caught by a reconnect
	// ============================================================================

	describe('operations during re-initialization', () => {
		it('holds a send while the client is replaced and completes it on the new client', async () => {
			await manager.initialize(signal);
			const first = nth(factory, 0);

			const openReleased = createDeferred();
			factory.configure = (client) => {
				client.open.callsFake(async () => {
					await openReleased.promise;
					client.setStatus(CONNECTED, OK);
				});
			};

			const publisher = new TelemetryPublisher(context, { random: () => 0 });

			first.emitStatus(DISCONNECTED, COMMUNICATION_ERROR);
			const sending = publisher.sendNext(signal);

			await delay(20);
			expect(manager.isClientReady()).toBe(false);
			openReleased.resolve();

			await expect(sending).resolves.toBe(true);
			await context.tasks.drain();

			const second = nth(factory, 1);
			expect(first.sendTelemetry.notCalled).toBe(true);
			expect(second.sendTelemetry.calledOnce).toBe(true);
			expect(publisher.sentCount).toBe(1);
			expect(loggedMessages(logger, 'debug')).toContain('SendTelemetry_1: client not ready, skipping this attempt');
		});
	});
});
