/**
 * Logging Component Names
 * 
 * Standardized component names for structured logging.
 * Use these constants instead of hardcoded strings to ensure consistency.
 * 
 * Usage:
 *   logger.info('Client opened', { component: LogComponents.LIFECYCLE });
 */

export const LogComponents = {
	// Application
	APP: 'DeviceApp',
	CONFIG: 'Config',

	// Connectivity
	LIFECYCLE: 'ConnectionLifecycle',
	TRANSPORT: 'MqttTransport',

	// Resilience
	RETRY: 'Retry',
	BACKOFF: 'Backoff',
	TASKS: 'BackgroundTasks',

	// Twin
	TWIN: 'Twin',

	// Messaging
	TELEMETRY: 'Telemetry',
	MESSAGES: 'CloudToDevice',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
