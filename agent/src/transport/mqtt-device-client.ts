import { connect, type MqttClient, type IClientPublishOptions } from 'mqtt';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
	ConnectionStatus,
	ConnectionStatusChangeReason,
	connectionState,
	type ConnectionState,
} from './connection-state';
import {
	ClientNotConnectedError,
	DeviceClientError,
	DeviceDisabledError,
	OperationTimeoutError,
	TwinRequestError,
	UnauthorizedError,
} from './errors';
import { deviceTopics, parseCommandTopic, telemetryTopic, type DeviceTopics } from './topics';
import type {
	ConnectionStatusChangeHandler,
	DesiredProperties,
	DesiredPropertyUpdateHandler,
	DeviceClient,
	DeviceCredential,
	IncomingMessage,
	MessageHandler,
	ReportedPropertiesPatch,
	TelemetryMessage,
	TwinProperties,
} from './types';
import { OperationCancelledError } from '../utils/cancellation';
import { LogComponents } from '../logging/components';
import { toError } from '../logging/logger';
import { silentLogger, type Logger } from '../logging/types';

export interface MqttDeviceClientOptions {
	/** Time allowed for the first CONNACK (default: 10000) */
	connectTimeoutMs?: number;
	/** Time allowed for a publish/subscribe/twin round trip (default: 5000) */
	operationTimeoutMs?: number;
	/** Delay between the transport's own reconnect attempts (default: 1000) */
	reconnectPeriodMs?: number;
	/** Reconnects tolerated before reporting RetryExpired (default: 10) */
	maxReconnectAttempts?: number;
	logger?: Logger;
}

// CONNACK return codes (MQTT 3.1.1) and reason codes (MQTT 5)
const BAD_CREDENTIAL_CODES = new Set([4, 134]);
const NOT_AUTHORIZED_CODES = new Set([5, 135]);
// Server unavailable (3, 136) and server busy (137)
const SERVER_UNAVAILABLE_CODES = new Set([3, 136, 137]);

const DesiredWireSchema = z.object({
	$version: z.number().int().nonnegative(),
}).catchall(z.unknown());

const TwinResponseSchema = z.object({
	status: z.number().int(),
	message: z.string().optional(),
	desired: DesiredWireSchema.optional(),
	reported: z.record(z.unknown()).optional(),
});

type TwinResponse = z.infer<typeof TwinResponseSchema>;

interface PendingTwinRequest {
	resolve: (response: TwinResponse) => void;
	reject: (error: Error) => void;
}

function toDesired(wire: z.infer<typeof DesiredWireSchema>): DesiredProperties {
	const { $version, ...properties } = wire;
	return { version: $version, properties };
}

function parseJson(payload: Buffer): unknown {
	try {
		return JSON.parse(payload.toString('utf8'));
	} catch {
		return undefined;
	}
}

/**
 * Reason for a rejected CONNACK, or null when the error is not an
 * authentication failure.
 */
export function connackFailureReason(error: Error): ConnectionStatusChangeReason | null {
	const code = 'code' in error ? error.code : undefined;
	if (typeof code !== 'number') {
		return null;
	}
	if (BAD_CREDENTIAL_CODES.has(code)) {
		return ConnectionStatusChangeReason.BAD_CREDENTIAL;
	}
	if (NOT_AUTHORIZED_CODES.has(code)) {
		return ConnectionStatusChangeReason.DEVICE_DISABLED;
	}
	return null;
}

/**
 * Wrap a refused CONNACK that the broker may accept later in a transient
 * error; any other error is returned unchanged.
 */
export function classifyConnectFailure(error: Error): Error {
	const code = 'code' in error ? error.code : undefined;
	if (typeof code === 'number' && SERVER_UNAVAILABLE_CODES.has(code)) {
		return new DeviceClientError(error.message, { isTransient: true, cause: error });
	}
	return error;
}

/**
 * Device client over MQTT.
 *
 * The mqtt package's own reconnect loop is the transport retry policy: while
 * it runs the client reports DisconnectedRetrying, and once it has failed
 * `maxReconnectAttempts` times the transport is stopped and RetryExpired is
 * reported. A closed instance cannot be reopened.
 */
export class MqttDeviceClient implements DeviceClient {
	private readonly topics: DeviceTopics;
	private readonly connectTimeoutMs: number;
	private readonly operationTimeoutMs: number;
	private readonly reconnectPeriodMs: number;
	private readonly maxReconnectAttempts: number;
	private readonly logger: Logger;

	private client: MqttClient | null = null;
	private state: ConnectionState = connectionState(
		ConnectionStatus.DISABLED,
		ConnectionStatusChangeReason.CLIENT_CLOSED
	);
	private openPromise: Promise<void> | null = null;
	private abortOpen: ((error: Error) => void) | null = null;
	private closed = false;
	private closing = false;
	private hasConnected = false;
	private reconnectAttempts = 0;

	private statusHandler?: ConnectionStatusChangeHandler;
	private messageHandler?: MessageHandler;
	private desiredHandler?: DesiredPropertyUpdateHandler;

	private readonly subscriptions = new Set<string>();
	private readonly pendingTwinRequests = new Map<string, PendingTwinRequest>();
	private readonly inbox: IncomingMessage[] = [];
	private receivers: Array<(message: IncomingMessage) => void> = [];

	constructor(
		private readonly credential: DeviceCredential,
		options: MqttDeviceClientOptions = {}
	) {
		this.topics = deviceTopics(credential.deviceId);
		this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
		this.operationTimeoutMs = options.operationTimeoutMs ?? 5000;
		this.reconnectPeriodMs = options.reconnectPeriodMs ?? 1000;
		this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
		this.logger = options.logger ?? silentLogger;
	}

	get connectionState(): ConnectionState {
		return this.state;
	}

	onConnectionStatusChange(handler: ConnectionStatusChangeHandler): void {
		this.statusHandler = handler;
	}

	/**
	 * Connect to the broker (idempotent - can be called multiple times)
	 */
	open(signal?: AbortSignal): Promise<void> {
		if (this.closed) {
			return Promise.reject(new DeviceClientError('Client has been closed; create a new instance'));
		}
		if (this.client && this.hasConnected) {
			return Promise.resolve();
		}
		if (this.openPromise) {
			return this.openPromise;
		}

		this.openPromise = this.connect(signal).finally(() => {
			this.openPromise = null;
			this.abortOpen = null;
		});
		return this.openPromise;
	}

	async close(signal?: AbortSignal): Promise<void> {
		this.closed = true;
		this.abortOpen?.(new ClientNotConnectedError('open'));

		const client = this.client;
		this.client = null;

		if (client) {
			this.closing = true;
			await new Promise<void>((resolve) => {
				const onAbort = () => {
					client.end(true);
					resolve();
				};
				if (signal?.aborted) {
					onAbort();
					return;
				}
				signal?.addEventListener('abort', onAbort, { once: true });
				client.end(false, {}, () => {
					signal?.removeEventListener('abort', onAbort);
					resolve();
				});
			});
			client.removeAllListeners();
			this.closing = false;
		}

		for (const pending of this.pendingTwinRequests.values()) {
			pending.reject(new ClientNotConnectedError('complete twin request'));
		}
		this.pendingTwinRequests.clear();
		this.subscriptions.clear();

		this.setState(ConnectionStatus.DISABLED, ConnectionStatusChangeReason.CLIENT_CLOSED);
		this.logger.debug('MQTT device client closed', {
			component: LogComponents.TRANSPORT,
			deviceId: this.credential.deviceId,
		});
	}

	async sendTelemetry(message: TelemetryMessage, signal?: AbortSignal): Promise<void> {
		const client = this.requireConnected('send telemetry');
		const topic = telemetryTopic(this.topics, { ...message.properties, '$.mid': message.messageId });
		await this.publish(client, topic, JSON.stringify(message.body), { qos: 1 }, 'SendTelemetry', signal);
	}

	async receiveMessage(timeoutMs: number, signal?: AbortSignal): Promise<IncomingMessage | null> {
		const client = this.requireConnected('receive messages');
		await this.ensureSubscribed(client, this.topics.commandsFilter, signal);

		const queued = this.inbox.shift();
		if (queued) {
			return queued;
		}

		return new Promise<IncomingMessage | null>((resolve, reject) => {
			const finish = () => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
				this.receivers = this.receivers.filter(receiver => receiver !== deliver);
			};
			const deliver = (message: IncomingMessage) => {
				finish();
				resolve(message);
			};
			const onAbort = () => {
				finish();
				reject(new OperationCancelledError('Receive cancelled'));
			};
			const timer = setTimeout(() => {
				finish();
				resolve(null);
			}, timeoutMs);

			if (signal?.aborted) {
				onAbort();
				return;
			}
			signal?.addEventListener('abort', onAbort, { once: true });
			this.receivers.push(deliver);
		});
	}

	async setMessageHandler(handler: MessageHandler, signal?: AbortSignal): Promise<void> {
		const client = this.requireConnected('subscribe to cloud-to-device messages');
		await this.ensureSubscribed(client, this.topics.commandsFilter, signal);
		this.messageHandler = handler;

		// Hand over anything that arrived before the handler was set
		for (const message of this.inbox.splice(0)) {
			this.dispatchMessage(handler, message);
		}
	}

	async setDesiredPropertyUpdateHandler(handler: DesiredPropertyUpdateHandler, signal?: AbortSignal): Promise<void> {
		const client = this.requireConnected('subscribe to desired property updates');
		await this.ensureSubscribed(client, this.topics.twinDesired, signal);
		this.desiredHandler = handler;
	}

	async getTwin(signal?: AbortSignal): Promise<TwinProperties> {
		const client = this.requireConnected('get twin');
		await this.ensureSubscribed(client, this.topics.twinResponseFilter, signal);

		const rid = randomUUID();
		let response: TwinResponse;
		try {
			response = await this.timed<TwinResponse>('GetTwin', this.operationTimeoutMs, signal, (resolve, reject) => {
				this.pendingTwinRequests.set(rid, { resolve, reject });
				client.publish(this.topics.twinGet, JSON.stringify({ rid }), { qos: 1 }, (error) => {
					if (error) {
						reject(new DeviceClientError(`Twin request publish failed: ${error.message}`, { isTransient: true, cause: error }));
					}
				});
			});
		} finally {
			this.pendingTwinRequests.delete(rid);
		}

		if (response.status === 401 || response.status === 403) {
			throw new UnauthorizedError(response.message ?? `Twin request rejected with status ${response.status}`);
		}
		if (response.status !== 200) {
			throw new TwinRequestError(response.status, response.message);
		}
		if (!response.desired) {
			throw new DeviceClientError('Twin response did not include desired properties');
		}

		return {
			desired: toDesired(response.desired),
			reported: response.reported ?? {},
		};
	}

	async updateReportedProperties(patch: ReportedPropertiesPatch, signal?: AbortSignal): Promise<void> {
		const client = this.requireConnected('update reported properties');
		await this.publish(client, this.topics.twinReported, JSON.stringify(patch), { qos: 1 }, 'UpdateReportedProperties', signal);
	}

	private connect(signal?: AbortSignal): Promise<void> {
		const { brokerUrl, deviceId, sharedAccessKey } = this.credential;

		this.logger.info(`Connecting to MQTT broker: ${brokerUrl}`, {
			component: LogComponents.TRANSPORT,
			deviceId,
		});

		return this.timed<void>('Connect', this.connectTimeoutMs, signal, (resolve, reject) => {
			const fail = (error: Error) => {
				this.stopTransport();
				reject(error);
			};
			this.abortOpen = fail;

			const client = connect(brokerUrl, {
				clientId: deviceId,
				username: deviceId,
				password: sharedAccessKey,
				clean: false,
				reconnectPeriod: this.reconnectPeriodMs,
				connectTimeout: this.connectTimeoutMs,
			});
			this.client = client;

			client.on('connect', () => {
				this.hasConnected = true;
				this.reconnectAttempts = 0;
				this.logger.info('Connected to MQTT broker', {
					component: LogComponents.TRANSPORT,
					deviceId,
				});
				this.setState(ConnectionStatus.CONNECTED, ConnectionStatusChangeReason.OK);
				resolve();
			});

			client.on('error', (error) => {
				const reason = connackFailureReason(error);
				if (reason) {
					this.logger.error('MQTT broker rejected the device credentials', {
						component: LogComponents.TRANSPORT,
						deviceId,
						reason,
						error: error.message,
					});
					this.stopTransport();
					this.setState(ConnectionStatus.DISCONNECTED, reason);
					reject(reason === ConnectionStatusChangeReason.BAD_CREDENTIAL
						? new UnauthorizedError(error.message, error)
						: new DeviceDisabledError(error.message, error));
					return;
				}

				if (!this.hasConnected) {
					fail(classifyConnectFailure(error));
					return;
				}

				this.logger.warn('MQTT connection error', {
					component: LogComponents.TRANSPORT,
					deviceId,
					error: error.message,
				});
			});

			client.on('offline', () => {
				if (this.closing || !this.hasConnected) {
					return;
				}
				this.logger.info('MQTT client offline', {
					component: LogComponents.TRANSPORT,
					deviceId,
				});
				this.setState(ConnectionStatus.DISCONNECTED_RETRYING, ConnectionStatusChangeReason.COMMUNICATION_ERROR);
			});

			client.on('reconnect', () => {
				if (this.closing || !this.hasConnected) {
					return;
				}
				this.reconnectAttempts++;
				if (this.reconnectAttempts > this.maxReconnectAttempts) {
					this.logger.warn(`Giving up on MQTT reconnect after ${this.maxReconnectAttempts} attempts`, {
						component: LogComponents.TRANSPORT,
						deviceId,
					});
					this.stopTransport();
					this.setState(ConnectionStatus.DISCONNECTED, ConnectionStatusChangeReason.RETRY_EXPIRED);
					return;
				}
				this.logger.info('MQTT client reconnecting', {
					component: LogComponents.TRANSPORT,
					deviceId,
					reconnectAttempts: this.reconnectAttempts,
				});
				this.setState(ConnectionStatus.DISCONNECTED_RETRYING, ConnectionStatusChangeReason.COMMUNICATION_ERROR);
			});

			client.on('message', (topic: string, payload: Buffer) => {
				this.routeMessage(topic, payload);
			});
		}).catch((error: unknown) => {
			// Timeout and cancellation leave a half-open socket behind
			this.stopTransport();
			throw error;
		});
	}

	/**
	 * Tear down the socket without marking the instance closed.
	 */
	private stopTransport(): void {
		const client = this.client;
		if (!client) {
			return;
		}
		this.client = null;
		this.subscriptions.clear();
		client.removeAllListeners();
		// Keep a listener so late socket errors are not thrown as unhandled 'error' events
		client.on('error', () => undefined);
		client.end(true);
	}

	private setState(status: ConnectionStatus, reason: ConnectionStatusChangeReason): void {
		if (this.state.status === status && this.state.reason === reason) {
			return;
		}
		this.state = connectionState(status, reason);

		try {
			this.statusHandler?.(this.state);
		} catch (error) {
			this.logger.error('Connection status handler threw', {
				component: LogComponents.TRANSPORT,
				error: toError(error).message,
			});
		}
	}

	private requireConnected(operation: string): MqttClient {
		if (!this.client || this.state.status !== ConnectionStatus.CONNECTED) {
			throw new ClientNotConnectedError(operation);
		}
		return this.client;
	}

	private async ensureSubscribed(client: MqttClient, topic: string, signal?: AbortSignal): Promise<void> {
		if (this.subscriptions.has(topic)) {
			return;
		}

		await this.timed<void>(`Subscribe ${topic}`, this.operationTimeoutMs, signal, (resolve, reject) => {
			client.subscribe(topic, { qos: 1 }, (error, granted) => {
				if (error) {
					reject(new DeviceClientError(`Subscribe error: ${error.message}`, { isTransient: true, cause: error }));
				} else if (!granted || granted.length === 0) {
					reject(new DeviceClientError(`Subscribe failed: No subscription granted for topic: ${topic}`));
				} else if (granted[0].qos === 128) {
					// QoS 128 means subscription failed (rejected by broker)
					reject(new DeviceClientError(`Subscribe rejected by broker (QoS=128) for topic: ${topic}`));
				} else {
					resolve();
				}
			});
		});

		this.subscriptions.add(topic);
		this.logger.debug(`Subscribed to topic: ${topic}`, { component: LogComponents.TRANSPORT });
	}

	private publish(
		client: MqttClient,
		topic: string,
		payload: string,
		options: IClientPublishOptions,
		operation: string,
		signal?: AbortSignal
	): Promise<void> {
		return this.timed<void>(operation, this.operationTimeoutMs, signal, (resolve, reject) => {
			client.publish(topic, payload, options, (error) => {
				if (error) {
					reject(new DeviceClientError(`${operation} failed: ${error.message}`, { isTransient: true, cause: error }));
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Run a callback-style operation bounded by a timeout and a signal.
	 */
	private timed<T>(
		operation: string,
		timeoutMs: number,
		signal: AbortSignal | undefined,
		run: (resolve: (value: T) => void, reject: (error: Error) => void) => void
	): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			if (signal?.aborted) {
				reject(new OperationCancelledError(`${operation} cancelled`));
				return;
			}

			const finish = () => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
			};
			const onAbort = () => {
				finish();
				reject(new OperationCancelledError(`${operation} cancelled`));
			};
			const timer = setTimeout(() => {
				finish();
				reject(new OperationTimeoutError(operation, timeoutMs));
			}, timeoutMs);
			signal?.addEventListener('abort', onAbort, { once: true });

			run(
				(value) => {
					finish();
					resolve(value);
				},
				(error) => {
					finish();
					reject(error);
				}
			);
		});
	}

	private routeMessage(topic: string, payload: Buffer): void {
		if (topic.startsWith(this.topics.twinResponsePrefix)) {
			this.handleTwinResponse(topic.slice(this.topics.twinResponsePrefix.length), payload);
			return;
		}

		if (topic === this.topics.twinDesired) {
			this.handleDesiredUpdate(payload);
			return;
		}

		const properties = parseCommandTopic(this.topics, topic);
		if (properties) {
			const message: IncomingMessage = { topic, payload, properties };
			if (this.messageHandler) {
				this.dispatchMessage(this.messageHandler, message);
				return;
			}
			const receiver = this.receivers.shift();
			if (receiver) {
				receiver(message);
			} else {
				this.inbox.push(message);
			}
			return;
		}

		this.logger.debug(`Ignoring message on unexpected topic ${topic}`, { component: LogComponents.TRANSPORT });
	}

	private handleTwinResponse(rid: string, payload: Buffer): void {
		const pending = this.pendingTwinRequests.get(rid);
		if (!pending) {
			this.logger.debug(`Ignoring twin response for unknown request ${rid}`, { component: LogComponents.TRANSPORT });
			return;
		}

		const parsed = TwinResponseSchema.safeParse(parseJson(payload));
		if (!parsed.success) {
			pending.reject(new DeviceClientError(`Malformed twin response: ${parsed.error.message}`));
			return;
		}
		pending.resolve(parsed.data);
	}

	private handleDesiredUpdate(payload: Buffer): void {
		const parsed = DesiredWireSchema.safeParse(parseJson(payload));
		if (!parsed.success) {
			this.logger.warn('Ignoring malformed desired property update', {
				component: LogComponents.TRANSPORT,
				error: parsed.error.message,
			});
			return;
		}

		const handler = this.desiredHandler;
		if (!handler) {
			return;
		}
		handler(toDesired(parsed.data)).catch((error: unknown) => {
			this.logger.error('Desired property update handler failed', {
				component: LogComponents.TRANSPORT,
				error: toError(error).message,
			});
		});
	}

	private dispatchMessage(handler: MessageHandler, message: IncomingMessage): void {
		handler(message)
			.then((ack) => {
				this.logger.debug(`Message on ${message.topic} acknowledged: ${ack}`, { component: LogComponents.TRANSPORT });
			})
			.catch((error: unknown) => {
				this.logger.error('Message handler failed', {
					component: LogComponents.TRANSPORT,
					topic: message.topic,
					error: toError(error).message,
				});
			});
	}
}
