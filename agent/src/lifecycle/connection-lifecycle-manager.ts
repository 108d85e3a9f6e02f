/**
 * Connection Lifecycle Manager
 * ============================
 *
 * Owns the device client handle and keeps it usable:
 * 1. Initialization: close the old client, build a new one from the head
 *    credential, open it, then re-subscribe callbacks. Only one
 *    initialization runs at a time (AsyncLock) and the "is it needed?" check
 *    runs both before and after taking the lock, so racing triggers collapse
 *    into one replacement.
 * 2. Status changes: the client's status-change callback is fire-and-forget;
 *    each notification becomes a tracked background task that consults the
 *    decision table below.
 *
 * | status               | reason             | action                         |
 * |----------------------|--------------------|--------------------------------|
 * | Connected            | *                  | reconcile twin                 |
 * | DisconnectedRetrying | *                  | none, the transport is retrying|
 * | Disabled             | *                  | none, closed on request        |
 * | Disconnected         | BadCredential      | next credential, or fatal      |
 * | Disconnected         | DeviceDisabled     | fatal                          |
 * | Disconnected         | RetryExpired       | re-initialize (configurable)   |
 * | Disconnected         | CommunicationError | re-initialize (configurable)   |
 * | anything else        |                    | log error, no action           |
 */

import type { DeviceContext } from '../context';
import type {
	DesiredPropertyUpdateHandler as DesiredPropertyCallback,
	DeviceClient,
	DeviceClientFactory,
	MessageHandler,
} from '../transport/types';
import {
	ConnectionStatus,
	ConnectionStatusChangeReason,
	describeConnectionState,
	type ConnectionState,
} from '../transport/connection-state';
import { DeviceDisabledError, UnauthorizedError } from '../transport/errors';
import type { TwinReconciler } from '../twin/twin-reconciler';
import { AsyncLock } from '../utils/async-lock';
import { createTimeoutController, isCancellation } from '../utils/cancellation';
import { attempt, unwrapOutcome } from '../retry/retry-executor';
import { CredentialsExhaustedError, FatalConnectionError } from './errors';
import { LogComponents } from '../logging/components';
import { toError } from '../logging/logger';

export type RecoverableDisconnectReason =
	| typeof ConnectionStatusChangeReason.RETRY_EXPIRED
	| typeof ConnectionStatusChangeReason.COMMUNICATION_ERROR;

export const DEFAULT_REINITIALIZE_ON: readonly RecoverableDisconnectReason[] = [
	ConnectionStatusChangeReason.RETRY_EXPIRED,
	ConnectionStatusChangeReason.COMMUNICATION_ERROR,
];

export const DEFAULT_CLOSE_TIMEOUT_MS = 30000;

export interface ConnectionLifecycleOptions {
	clientFactory: DeviceClientFactory;
	twinReconciler: TwinReconciler;
	messageHandler: MessageHandler;
	desiredPropertyHandler: DesiredPropertyCallback;
	/** Disconnect reasons answered by building a fresh client */
	reinitializeOn?: readonly RecoverableDisconnectReason[];
	/** Bound on the final close during shutdown */
	closeTimeoutMs?: number;
}

interface ReplacedClient {
	client: DeviceClient;
	/** False when the hub rejected the credential; the status change drives recovery */
	opened: boolean;
}

const REPLACEABLE_STATUSES: ReadonlySet<ConnectionStatus> = new Set([
	ConnectionStatus.DISCONNECTED,
	ConnectionStatus.DISABLED,
]);

export class ConnectionLifecycleManager {
	private readonly initLock = new AsyncLock();
	private readonly reinitializeOn: ReadonlySet<ConnectionStatusChangeReason>;
	private readonly closeTimeoutMs: number;
	private shutdownPromise: Promise<void> | null = null;

	constructor(
		private readonly context: DeviceContext,
		private readonly options: ConnectionLifecycleOptions
	) {
		this.reinitializeOn = new Set(options.reinitializeOn ?? DEFAULT_REINITIALIZE_ON);
		this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
	}

	getClient(): DeviceClient | null {
		return this.context.client.current();
	}

	isClientReady(): boolean {
		return this.context.client.isReady();
	}

	/**
	 * A missing client must be built, and a Disconnected or Disabled one
	 * replaced. Connected and self-retrying clients are left alone.
	 */
	needsInitialization(): boolean {
		if (!this.context.credentials.hasAny() || this.shutdownPromise) {
			return false;
		}
		const client = this.context.client.current();
		return client === null || REPLACEABLE_STATUSES.has(client.connectionState.status);
	}

	/**
	 * Make sure a usable client exists. No-op when the current one is fine.
	 */
	async initialize(signal: AbortSignal): Promise<void> {
		if (!this.needsInitialization()) {
			return;
		}

		const replaced = await this.initLock.runExclusive(async () => {
			if (!this.needsInitialization()) {
				this.context.logger.debug('Client was initialized by a concurrent caller', {
					component: LogComponents.LIFECYCLE,
				});
				return null;
			}
			return this.replaceClient(signal);
		}, signal);

		if (replaced?.opened) {
			// Subscriptions do not survive a client replacement
			await this.subscribe(replaced.client, signal);
		}
	}

	/**
	 * Status-change target handed to the client. Never throws and never
	 * blocks the transport.
	 */
	handleConnectionStatusChange(source: DeviceClient, state: ConnectionState): void {
		this.context.logger.info(`Connection status changed: ${describeConnectionState(state)}`, {
			component: LogComponents.LIFECYCLE,
			status: state.status,
			reason: state.reason,
		});

		if (source !== this.context.client.current()) {
			this.context.logger.debug('Ignoring status change from a superseded client', {
				component: LogComponents.LIFECYCLE,
			});
			return;
		}
		if (this.shutdownPromise) {
			return;
		}

		this.context.tasks.track(
			`ConnectionStatusChange:${state.status}/${state.reason}`,
			this.processConnectionStatusChange(state)
		);
	}

	/**
	 * Never rejects. A failure other than cancellation aborts the application
	 * with a FatalConnectionError.
	 */
	async processConnectionStatusChange(state: ConnectionState): Promise<void> {
		const { logger, cancellation } = this.context;
		const signal = cancellation.signal;

		try {
			switch (state.status) {
				case ConnectionStatus.CONNECTED:
					// Catch desired-property updates that happened while offline
					await this.options.twinReconciler.reconcile(signal);
					logger.info('Retrieved twin values after the connection status changed to Connected', {
						component: LogComponents.LIFECYCLE,
					});
					return;

				case ConnectionStatus.DISCONNECTED_RETRYING:
					logger.info('Letting the client retry', { component: LogComponents.LIFECYCLE });
					return;

				case ConnectionStatus.DISABLED:
					logger.info('Client was closed on request; it must be initialized again to resume', {
						component: LogComponents.LIFECYCLE,
					});
					return;

				case ConnectionStatus.DISCONNECTED:
					await this.handleDisconnected(state, signal);
					return;

				default:
					this.logUnexpected(state);
			}
		} catch (error) {
			if (isCancellation(error)) {
				logger.debug('Status change handling cancelled', {
					component: LogComponents.LIFECYCLE,
					status: state.status,
				});
				return;
			}
			// Nothing retries a failed handler, so the run ends here
			this.fail(error instanceof FatalConnectionError
				? error
				: new FatalConnectionError(
					`Handling connection status ${state.status}/${state.reason} failed: ${toError(error).message}`,
					{ cause: error }
				));
		}
	}

	/**
	 * Close the current client exactly once. Uses its own timeout signal
	 * because the application signal is already aborted at this point.
	 */
	shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.closeForShutdown();
		}
		return this.shutdownPromise;
	}

	private async handleDisconnected(state: ConnectionState, signal: AbortSignal): Promise<void> {
		const { logger, credentials } = this.context;

		switch (state.reason) {
			case ConnectionStatusChangeReason.BAD_CREDENTIAL: {
				const rejected = credentials.current();
				const next = credentials.discardCurrent();
				if (!next) {
					this.fail(new CredentialsExhaustedError());
					return;
				}
				logger.warn('The current credential is invalid. Trying another', {
					component: LogComponents.LIFECYCLE,
					rejected: rejected?.label,
					next: next.label,
					remaining: credentials.size,
				});
				await this.initialize(signal);
				return;
			}

			case ConnectionStatusChangeReason.DEVICE_DISABLED:
				this.fail(new FatalConnectionError(
					'The device has been disabled at the hub; enable it and restart'
				));
				return;

			case ConnectionStatusChangeReason.RETRY_EXPIRED:
			case ConnectionStatusChangeReason.COMMUNICATION_ERROR:
				if (!this.reinitializeOn.has(state.reason)) {
					logger.warn(`Not re-initializing the client for reason ${state.reason}`, {
						component: LogComponents.LIFECYCLE,
					});
					return;
				}
				logger.info('Re-initializing the client', {
					component: LogComponents.LIFECYCLE,
					reason: state.reason,
				});
				await this.initialize(signal);
				return;

			default:
				this.logUnexpected(state);
		}
	}

	/**
	 * Body of the critical section. Caller holds `initLock`.
	 */
	private async replaceClient(signal: AbortSignal): Promise<ReplacedClient> {
		const { logger, credentials, client: slot, retry } = this.context;
		const previous = slot.current();

		logger.debug('Attempting to initialize the client instance', {
			component: LogComponents.LIFECYCLE,
			currentStatus: previous?.connectionState.status ?? 'none',
		});

		if (previous) {
			try {
				await previous.close(signal);
			} catch (error) {
				// The previous token may already be invalid
				if (!(error instanceof UnauthorizedError)) {
					throw error;
				}
				logger.debug('Ignoring unauthorized error while closing the previous client', {
					component: LogComponents.LIFECYCLE,
				});
			}
		}

		const credential = credentials.current();
		if (!credential) {
			throw new CredentialsExhaustedError();
		}

		const client = this.options.clientFactory(credential);
		client.onConnectionStatusChange((state) => this.handleConnectionStatusChange(client, state));
		slot.replace(client);
		logger.debug('Initialized the client instance', {
			component: LogComponents.LIFECYCLE,
			credential: credential.label,
		});

		// open() is idempotent, so retrying it after a partial success is safe.
		// A rejected credential is not retried here: the client reports it as a
		// status change and that path picks the next credential.
		const outcome = await retry.run({
			operationName: 'OpenConnection',
			operation: (opSignal) => attempt(
				() => client.open(opSignal),
				(error) => !isAuthenticationFailure(error) && retry.isTransient(error)
			),
			signal,
		});

		if (outcome.status === 'failed' && isAuthenticationFailure(outcome.error)) {
			logger.warn('The hub rejected the credential while opening the client', {
				component: LogComponents.LIFECYCLE,
				credential: credential.label,
				error: toError(outcome.error).message,
			});
			return { client, opened: false };
		}
		unwrapOutcome(outcome, 'OpenConnection');

		logger.info('The client instance has been opened', {
			component: LogComponents.LIFECYCLE,
			credential: credential.label,
		});
		return { client, opened: true };
	}

	private async subscribe(client: DeviceClient, signal: AbortSignal): Promise<void> {
		const subscribed = await this.subscribeWithRetry(
			'SubscribeMessages',
			client,
			(opSignal) => client.setMessageHandler(this.options.messageHandler, opSignal),
			signal
		);
		if (!subscribed) {
			return;
		}
		this.context.logger.debug('The client has subscribed to cloud-to-device messages', {
			component: LogComponents.LIFECYCLE,
		});

		if (await this.subscribeWithRetry(
			'SubscribeTwinUpdates',
			client,
			(opSignal) => client.setDesiredPropertyUpdateHandler(this.options.desiredPropertyHandler, opSignal),
			signal
		)) {
			this.context.logger.debug('The client has subscribed to desired property update notifications', {
				component: LogComponents.LIFECYCLE,
			});
		}
	}

	/**
	 * @returns false when the client was replaced before the subscription went through
	 */
	private async subscribeWithRetry(
		operationName: string,
		client: DeviceClient,
		subscribe: (signal: AbortSignal) => Promise<void>,
		signal: AbortSignal
	): Promise<boolean> {
		const { retry, client: slot, logger } = this.context;

		const outcome = await retry.run({
			operationName,
			operation: (opSignal) => attempt(() => subscribe(opSignal), retry.isTransient),
			isReady: () => client === slot.current() && slot.isReady(),
			isAbandoned: () => client !== slot.current(),
			signal,
		});

		if (outcome.status === 'cancelled' && !signal.aborted) {
			logger.debug(`${operationName} abandoned; the client was replaced`, {
				component: LogComponents.LIFECYCLE,
			});
			return false;
		}
		unwrapOutcome(outcome, operationName);
		return true;
	}

	private fail(error: FatalConnectionError): void {
		this.context.logger.error(error.message, {
			component: LogComponents.LIFECYCLE,
			error: error.name,
		});
		this.context.cancellation.abort(error);
	}

	private logUnexpected(state: ConnectionState): void {
		this.context.logger.error(`Unexpected connection state, taking no action: ${describeConnectionState(state)}`, {
			component: LogComponents.LIFECYCLE,
			status: state.status,
			reason: state.reason,
		});
	}

	/**
	 * Waits out an in-flight replacement, so a client being closed by it is not
	 * closed a second time. The close timeout bounds the wait as well.
	 */
	private async closeForShutdown(): Promise<void> {
		const { signal, dispose } = createTimeoutController(this.closeTimeoutMs);
		try {
			await this.initLock.runExclusive(async () => {
				const client = this.context.client.current();
				if (!client) {
					return;
				}
				await client.close(signal);
				this.context.logger.info('Closed the client', { component: LogComponents.LIFECYCLE });
			}, signal);
		} catch (error) {
			const err = toError(error);
			this.context.logger.warn('Failed to close the client cleanly', {
				component: LogComponents.LIFECYCLE,
				error: err.message,
			});
		} finally {
			dispose();
		}
	}
}

function isAuthenticationFailure(error: unknown): boolean {
	return error instanceof UnauthorizedError || error instanceof DeviceDisabledError;
}
