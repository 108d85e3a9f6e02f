import type { DeviceContext } from '../context';
import type { TelemetryMessage } from '../transport/types';
import { attempt, unwrapOutcome } from '../retry/retry-executor';
import { isCancellation, sleep } from '../utils/cancellation';
import { LogComponents } from '../logging/components';

export const TEMPERATURE_ALERT_THRESHOLD = 30;
export const DEFAULT_TELEMETRY_INTERVAL_MS = 15000;

export interface TelemetryPublisherOptions {
	intervalMs?: number;
	/** Uniform source in [0, 1) */
	random?: () => number;
}

function randomInt(random: () => number, min: number, maxExclusive: number): number {
	return min + Math.floor(random() * (maxExclusive - min));
}

/**
 * Build a simulated environment reading.
 */
export function createTelemetryMessage(messageId: number, random: () => number = Math.random): TelemetryMessage {
	const temperature = randomInt(random, 20, 35);
	const humidity = randomInt(random, 60, 80);

	return {
		messageId: String(messageId),
		body: { temperature, humidity },
		properties: {
			temperatureAlert: temperature > TEMPERATURE_ALERT_THRESHOLD ? 'true' : 'false',
		},
	};
}

/**
 * Periodically sends a telemetry message while the client is connected.
 * Each send goes through the retry executor, so a send caught by a reconnect
 * waits for the new client instead of failing.
 */
export class TelemetryPublisher {
	private readonly intervalMs: number;
	private readonly random: () => number;
	private messageCount = 0;

	constructor(
		private readonly context: DeviceContext,
		options: TelemetryPublisherOptions = {}
	) {
		this.intervalMs = options.intervalMs ?? DEFAULT_TELEMETRY_INTERVAL_MS;
		this.random = options.random ?? Math.random;
	}

	get sentCount(): number {
		return this.messageCount;
	}

	/**
	 * Send loop; returns once the signal aborts.
	 */
	async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			if (this.context.client.isReady()) {
				await this.sendNext(signal);
			}

			await sleep(this.intervalMs, signal);
		}
	}

	/**
	 * @returns false if the send was cancelled
	 */
	async sendNext(signal: AbortSignal): Promise<boolean> {
		const { logger, retry, client } = this.context;
		const messageNumber = this.messageCount + 1;
		const message = createTelemetryMessage(messageNumber, this.random);

		logger.info(`Device sending message ${messageNumber} to the hub`, {
			component: LogComponents.TELEMETRY,
			body: message.body,
		});

		const outcome = await retry.run({
			operationName: `SendTelemetry_${messageNumber}`,
			operation: (opSignal) => attempt(
				() => client.require('send telemetry').sendTelemetry(message, opSignal),
				retry.isTransient
			),
			isReady: client.isReady,
			signal,
		});

		try {
			unwrapOutcome(outcome, `SendTelemetry_${messageNumber}`);
		} catch (error) {
			if (isCancellation(error)) {
				return false;
			}
			throw error;
		}

		this.messageCount = messageNumber;
		logger.info(`Device sent message ${messageNumber} to the hub`, {
			component: LogComponents.TELEMETRY,
		});
		return true;
	}
}
