import { LogComponents } from '../logging/components';
import { toError } from '../logging/logger';
import { isCancellation } from '../utils/cancellation';
import type { Logger } from '../logging/types';

/**
 * Tracks fire-and-forget work started from callbacks that cannot be awaited
 * (e.g. a transport's status-change notification).
 *
 * Rejections are logged instead of becoming unhandled; cancellation errors
 * are logged at debug level only.
 */
export class BackgroundTasks {
	private readonly inFlight = new Set<Promise<void>>();

	constructor(private readonly logger: Logger) {}

	track(name: string, task: Promise<void>): void {
		const tracked = task
			.catch((error: unknown) => {
				if (isCancellation(error)) {
					this.logger.debug(`Background task ${name} cancelled`, {
						component: LogComponents.TASKS,
						task: name,
					});
					return;
				}
				const err = toError(error);
				this.logger.error(`Background task ${name} failed`, {
					component: LogComponents.TASKS,
					task: name,
					error: err.message,
					stack: err.stack,
				});
			})
			.finally(() => {
				this.inFlight.delete(tracked);
			});

		this.inFlight.add(tracked);
	}

	get size(): number {
		return this.inFlight.size;
	}

	/**
	 * Wait for every task tracked so far, including ones started while waiting.
	 */
	async drain(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}
}
