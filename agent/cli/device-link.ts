#!/usr/bin/env node
/**
 * device-link - device connectivity CLI
 * =====================================
 *
 * Usage:
 *   device-link run [--env-file <path>]     - Connect and publish telemetry
 *   device-link config [--env-file <path>]  - Validate and show configuration
 *   device-link help                        - Show this help
 */

import { ConfigurationError, loadConfig, type DeviceConfig } from '../src/config';
import { DeviceApplication } from '../src/device-app';
import { MqttDeviceClient } from '../src/transport/mqtt-device-client';
import { createLogger } from '../src/logging/logger';
import { LogComponents } from '../src/logging/components';

function showHelp(): void {
	console.log(`
device-link - keeps a device connected to its hub and publishes telemetry

Usage:
  device-link run [--env-file <path>]     Connect and publish telemetry
  device-link config [--env-file <path>]  Validate and show configuration
  device-link help                        Show this help

Configuration is read from the environment (and .env):
  MQTT_BROKER_URL, DEVICE_ID, DEVICE_KEYS (comma separated, tried in order),
  APP_RUNNING_TIME_SECONDS, TELEMETRY_INTERVAL_MS, MAX_RETRY_EXPONENT,
  MAX_OPERATION_RETRIES, REINITIALIZE_ON, TRANSPORT_MAX_RECONNECT_ATTEMPTS,
  TRANSPORT_RECONNECT_PERIOD_MS, CONNECT_TIMEOUT_MS, OPERATION_TIMEOUT_MS,
  CLOSE_TIMEOUT_MS, LOG_LEVEL, LOG_FORMAT
`);
}

function maskKey(key: string): string {
	return key.length <= 4 ? '****' : `${key.slice(0, 2)}****${key.slice(-2)}`;
}

function showConfig(config: DeviceConfig): void {
	const printable = {
		...config,
		credentials: config.credentials.map(credential => ({
			...credential,
			sharedAccessKey: maskKey(credential.sharedAccessKey),
		})),
	};
	console.log(JSON.stringify(printable, null, 2));
}

async function runDevice(config: DeviceConfig): Promise<boolean> {
	const logger = createLogger({
		level: config.logLevel,
		format: config.logFormat,
		service: 'device-link',
	});

	const app = new DeviceApplication({
		config,
		logger,
		clientFactory: (credential) => new MqttDeviceClient(credential, {
			...config.transport,
			logger,
		}),
	});

	const result = await app.run();
	if (result.fatal) {
		logger.error('Device stopped on a fatal error', {
			component: LogComponents.APP,
			error: result.error?.message,
		});
	}
	return !result.fatal;
}

function parseEnvFile(args: string[]): string | undefined {
	const index = args.indexOf('--env-file');
	return index >= 0 ? args[index + 1] : undefined;
}

async function main(): Promise<void> {
	const args = process.argv.slice(2);
	const command = args[0] ?? 'run';

	if (command === 'help' || command === '--help' || command === '-h') {
		showHelp();
		return;
	}
	if (command !== 'run' && command !== 'config') {
		console.error(`Unknown command: ${command}`);
		showHelp();
		process.exitCode = 2;
		return;
	}

	let config: DeviceConfig;
	try {
		config = loadConfig(parseEnvFile(args));
	} catch (error) {
		if (error instanceof ConfigurationError) {
			console.error(error.message);
			process.exitCode = 2;
			return;
		}
		throw error;
	}

	if (command === 'config') {
		showConfig(config);
		return;
	}

	if (!(await runDevice(config))) {
		process.exitCode = 1;
	}
}

main().catch((error: unknown) => {
	console.error('Fatal error:', error);
	process.exitCode = 1;
});
