export { DeviceApplication, onSigint } from './device-app';
export type { DeviceApplicationOptions, InterruptRegistrar, RunResult } from './device-app';
export { createDeviceContext } from './context';
export type { DeviceContext, DeviceContextOptions } from './context';
export { ConfigurationError, loadConfig, parseConfig } from './config';
export type { DeviceConfig } from './config';

export { ConnectionLifecycleManager, DEFAULT_REINITIALIZE_ON } from './lifecycle/connection-lifecycle-manager';
export type { ConnectionLifecycleOptions, RecoverableDisconnectReason } from './lifecycle/connection-lifecycle-manager';
export { CredentialsExhaustedError, FatalConnectionError } from './lifecycle/errors';
export { BackgroundTasks } from './lifecycle/background-tasks';
export { CredentialSet } from './lifecycle/credential-set';
export { ClientSlot } from './lifecycle/client-slot';

export { ExponentialBackoffPolicy } from './retry/backoff-policy';
export type { BackoffDecision, BackoffPolicy, ExponentialBackoffOptions } from './retry/backoff-policy';
export { RetryExecutor, attempt, fatalFailure, succeeded, transientFailure, unwrapOutcome } from './retry/retry-executor';
export type { OperationResult, RetryOutcome, RetryRunOptions } from './retry/retry-executor';

export { TwinReconciler } from './twin/twin-reconciler';
export { DesiredPropertyUpdateHandler } from './twin/desired-property-handler';
export { TwinVersionWatermark, INITIAL_DESIRED_PROPERTY_VERSION } from './twin/version-watermark';

export { TelemetryPublisher, createTelemetryMessage } from './telemetry/telemetry-publisher';
export { createMessageHandler } from './telemetry/message-handler';

export { MqttDeviceClient } from './transport/mqtt-device-client';
export type { MqttDeviceClientOptions } from './transport/mqtt-device-client';
export * from './transport/connection-state';
export * from './transport/errors';
export { MessageAcknowledgement } from './transport/types';
export type {
	ConnectionStatusChangeHandler,
	DesiredProperties,
	DeviceClient,
	DeviceClientFactory,
	DeviceCredential,
	IncomingMessage,
	MessageHandler,
	ReportedPropertiesPatch,
	TelemetryMessage,
	TwinProperties,
} from './transport/types';

export { createLogger } from './logging/logger';
export { LogComponents } from './logging/components';
export type { Logger, LogMeta } from './logging/types';
