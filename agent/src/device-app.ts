/**
 * Device Application
 *
 * Wires the device context, the connection lifecycle manager, twin handling
 * and the telemetry loop, and runs them until the running time elapses, the
 * process is interrupted or a fatal connection error ends the run.
 */

import { createDeviceContext } from './context';
import { ConnectionLifecycleManager } from './lifecycle/connection-lifecycle-manager';
import { FatalConnectionError } from './lifecycle/errors';
import { DesiredPropertyUpdateHandler } from './twin/desired-property-handler';
import { TwinReconciler } from './twin/twin-reconciler';
import { TelemetryPublisher } from './telemetry/telemetry-publisher';
import { createMessageHandler } from './telemetry/message-handler';
import type { DeviceClientFactory } from './transport/types';
import type { DeviceConfig } from './config';
import { OperationCancelledError, isCancellation } from './utils/cancellation';
import { LogComponents } from './logging/components';
import { toError } from './logging/logger';
import type { Logger } from './logging/types';

export type InterruptRegistrar = (onInterrupt: () => void) => () => void;

export interface DeviceApplicationOptions {
	config: Pick<
		DeviceConfig,
		'credentials' | 'runningTimeMs' | 'telemetryIntervalMs' | 'maxRetryExponent'
		| 'maxOperationRetries' | 'reinitializeOn' | 'closeTimeoutMs'
	>;
	logger: Logger;
	clientFactory: DeviceClientFactory;
	/** Subscribes to Ctrl+C by default; returns an unsubscribe function */
	registerInterrupt?: InterruptRegistrar;
	random?: () => number;
}

export interface RunResult {
	/** True when the run ended because of an error that needs user action */
	fatal: boolean;
	error?: Error;
	messagesSent: number;
}

export const onSigint: InterruptRegistrar = (onInterrupt) => {
	process.once('SIGINT', onInterrupt);
	return () => {
		process.removeListener('SIGINT', onInterrupt);
	};
};

export class DeviceApplication {
	private readonly registerInterrupt: InterruptRegistrar;

	constructor(private readonly options: DeviceApplicationOptions) {
		this.registerInterrupt = options.registerInterrupt ?? onSigint;
	}

	async run(): Promise<RunResult> {
		const { config, logger, clientFactory } = this.options;
		const cancellation = new AbortController();
		const { signal } = cancellation;

		const context = createDeviceContext({
			logger,
			credentials: config.credentials,
			maxRetryExponent: config.maxRetryExponent,
			maxOperationRetries: config.maxOperationRetries,
			cancellation,
		});

		const runningTimer = config.runningTimeMs === undefined
			? undefined
			: setTimeout(() => {
				logger.info(`Running time of ${config.runningTimeMs}ms elapsed, stopping`, {
					component: LogComponents.APP,
				});
				cancellation.abort(new OperationCancelledError('Running time elapsed'));
			}, config.runningTimeMs);

		const unregisterInterrupt = this.registerInterrupt(() => {
			logger.info('Interrupt received, stopping', { component: LogComponents.APP });
			cancellation.abort(new OperationCancelledError('Interrupted'));
		});

		const desiredHandler = new DesiredPropertyUpdateHandler(context);
		const manager = new ConnectionLifecycleManager(context, {
			clientFactory,
			twinReconciler: new TwinReconciler(context, desiredHandler),
			messageHandler: createMessageHandler(logger),
			desiredPropertyHandler: async (update) => {
				await desiredHandler.handle(update, signal);
			},
			reinitializeOn: config.reinitializeOn,
			closeTimeoutMs: config.closeTimeoutMs,
		});
		const publisher = new TelemetryPublisher(context, {
			intervalMs: config.telemetryIntervalMs,
			random: this.options.random,
		});

		logger.info('Device application starting', {
			component: LogComponents.APP,
			credentials: config.credentials.length,
			runningTimeMs: config.runningTimeMs ?? 'unbounded',
		});

		let failure: Error | undefined;
		try {
			await manager.initialize(signal);
			await publisher.run(signal);
		} catch (error) {
			if (isCancellation(error)) {
				logger.debug('Device application cancelled', { component: LogComponents.APP });
			} else {
				failure = toError(error);
				logger.error('Unrecoverable exception caught, user action is required, so exiting', {
					component: LogComponents.APP,
					error: failure.message,
					stack: failure.stack,
				});
				cancellation.abort(failure);
			}
		} finally {
			clearTimeout(runningTimer);
			unregisterInterrupt();
			await manager.shutdown();
			await context.tasks.drain();
		}

		// A fatal status change aborts the controller rather than throwing here
		const reason: unknown = signal.reason;
		if (!failure && reason instanceof FatalConnectionError) {
			failure = reason;
		}

		logger.info('Device application finished', {
			component: LogComponents.APP,
			messagesSent: publisher.sentCount,
			fatal: failure !== undefined,
		});

		return {
			fatal: failure !== undefined,
			error: failure,
			messagesSent: publisher.sentCount,
		};
	}
}
