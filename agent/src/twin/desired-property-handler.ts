import type { DeviceContext } from '../context';
import type { DesiredProperties, ReportedPropertiesPatch } from '../transport/types';
import { attempt } from '../retry/retry-executor';
import { LogComponents } from '../logging/components';

/**
 * Applies desired-property updates, whether they arrive as live
 * notifications or are recovered by reconciliation.
 *
 * Every desired key is accepted and echoed back as a reported property.
 */
export class DesiredPropertyUpdateHandler {
	constructor(private readonly context: DeviceContext) {}

	/**
	 * @returns true if the update was applied, false if it was stale or the
	 * application is shutting down
	 */
	async handle(update: DesiredProperties, signal: AbortSignal): Promise<boolean> {
		const { logger, watermark, retry, client } = this.context;

		if (signal.aborted) {
			return false;
		}

		const previousVersion = watermark.current;
		if (!watermark.tryAdvance(update.version)) {
			logger.debug('Ignoring desired property update that is already applied', {
				component: LogComponents.TWIN,
				version: update.version,
				watermark: previousVersion,
			});
			return false;
		}

		logger.info('Twin property update requested', {
			component: LogComponents.TWIN,
			version: update.version,
			desired: update.properties,
		});

		const patch = this.buildReportedPatch(update);
		logger.debug(`The desired property version on local is currently ${watermark.current}`, {
			component: LogComponents.TWIN,
			previousVersion,
		});

		const outcome = await retry.run({
			operationName: 'UpdateReportedProperties',
			operation: (opSignal) => attempt(
				() => client.require('update reported properties').updateReportedProperties(patch, opSignal),
				retry.isTransient
			),
			isReady: client.isReady,
			signal,
		});

		if (outcome.status === 'failed') {
			throw outcome.error;
		}
		if (outcome.status === 'cancelled') {
			logger.debug('Reported property update cancelled during shutdown', {
				component: LogComponents.TWIN,
				version: update.version,
			});
		}

		return true;
	}

	private buildReportedPatch(update: DesiredProperties): ReportedPropertiesPatch {
		const patch: ReportedPropertiesPatch = {};

		for (const [key, value] of Object.entries(update.properties)) {
			this.context.logger.info(`Setting property ${key} to ${JSON.stringify(value)}`, {
				component: LogComponents.TWIN,
			});
			patch[key] = value;
		}

		return patch;
	}
}
