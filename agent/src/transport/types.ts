import type { ConnectionState } from './connection-state';

export interface DeviceCredential {
	/** Human-readable name for logs, e.g. 'primary' */
	label: string;
	deviceId: string;
	brokerUrl: string;
	sharedAccessKey: string;
}

export interface TelemetryMessage {
	messageId: string;
	body: Record<string, unknown>;
	properties: Record<string, string>;
}

export interface IncomingMessage {
	topic: string;
	payload: Buffer;
	properties: Record<string, string>;
}

export const MessageAcknowledgement = {
	COMPLETE: 'Complete',
	REJECT: 'Reject',
} as const;

export type MessageAcknowledgement = typeof MessageAcknowledgement[keyof typeof MessageAcknowledgement];

export interface DesiredProperties {
	version: number;
	properties: Record<string, unknown>;
}

export interface TwinProperties {
	desired: DesiredProperties;
	reported: Record<string, unknown>;
}

export type ReportedPropertiesPatch = Record<string, unknown>;

export type ConnectionStatusChangeHandler = (state: ConnectionState) => void;
export type MessageHandler = (message: IncomingMessage) => Promise<MessageAcknowledgement>;
export type DesiredPropertyUpdateHandler = (update: DesiredProperties) => Promise<void>;

/**
 * Capability surface of a hub connection. One instance is one handle: once
 * closed it is not reopened, a new instance is created instead.
 */
export interface DeviceClient {
	/** Last observed connection state */
	readonly connectionState: ConnectionState;

	/** Connect; calling it on an open client is a no-op */
	open(signal?: AbortSignal): Promise<void>;
	close(signal?: AbortSignal): Promise<void>;

	/** Single status-change target; a later call replaces the earlier one */
	onConnectionStatusChange(handler: ConnectionStatusChangeHandler): void;

	sendTelemetry(message: TelemetryMessage, signal?: AbortSignal): Promise<void>;

	/**
	 * Pull the next cloud-to-device message when no message handler is set.
	 * Resolves null if nothing arrives within `timeoutMs`.
	 */
	receiveMessage(timeoutMs: number, signal?: AbortSignal): Promise<IncomingMessage | null>;

	setMessageHandler(handler: MessageHandler, signal?: AbortSignal): Promise<void>;
	setDesiredPropertyUpdateHandler(handler: DesiredPropertyUpdateHandler, signal?: AbortSignal): Promise<void>;

	getTwin(signal?: AbortSignal): Promise<TwinProperties>;
	updateReportedProperties(patch: ReportedPropertiesPatch, signal?: AbortSignal): Promise<void>;
}

export type DeviceClientFactory = (credential: DeviceCredential) => DeviceClient;
