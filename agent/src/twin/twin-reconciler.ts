import type { DeviceContext } from '../context';
import type { DesiredPropertyUpdateHandler } from './desired-property-handler';
import { attempt, unwrapOutcome } from '../retry/retry-executor';
import { LogComponents } from '../logging/components';

/**
 * Recovers desired-property updates missed while the device was offline.
 *
 * Runs every time the client reports Connected: fetches the twin and, when the
 * hub's desired version is ahead of the local watermark, replays it through
 * the same handler used for live notifications.
 */
export class TwinReconciler {
	constructor(
		private readonly context: DeviceContext,
		private readonly updateHandler: DesiredPropertyUpdateHandler
	) {}

	/**
	 * @returns true if an update was applied
	 */
	async reconcile(signal: AbortSignal): Promise<boolean> {
		const { logger, watermark, retry, client } = this.context;

		const outcome = await retry.run({
			operationName: 'GetTwin',
			operation: (opSignal) => attempt(
				() => client.require('get twin').getTwin(opSignal),
				retry.isTransient
			),
			isReady: client.isReady,
			signal,
		});
		const twin = unwrapOutcome(outcome, 'GetTwin');

		const serverVersion = twin.desired.version;
		logger.info('Device retrieved twin values', {
			component: LogComponents.TWIN,
			serverVersion,
			localVersion: watermark.current,
		});

		if (!watermark.isBehind(serverVersion)) {
			return false;
		}

		logger.debug(`The desired property version cached on local is changing from ${watermark.current} to ${serverVersion}`, {
			component: LogComponents.TWIN,
		});
		return this.updateHandler.handle(twin.desired, signal);
	}
}
