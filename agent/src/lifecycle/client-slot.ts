import { ConnectionStatus } from '../transport/connection-state';
import { ClientNotConnectedError } from '../transport/errors';
import type { DeviceClient } from '../transport/types';

/**
 * Holder for the one live device client.
 *
 * Only the lifecycle manager swaps the client; everyone else reads it on each
 * use and never caches it, so they always see either the old or the new
 * instance.
 */
export class ClientSlot {
	private client: DeviceClient | null = null;

	current(): DeviceClient | null {
		return this.client;
	}

	/**
	 * Current client, or a transient error when there is none yet.
	 */
	require(operation: string): DeviceClient {
		if (!this.client) {
			throw new ClientNotConnectedError(operation);
		}
		return this.client;
	}

	/**
	 * Readiness predicate for the retry executor.
	 */
	isReady = (): boolean => {
		return this.client !== null && this.client.connectionState.status === ConnectionStatus.CONNECTED;
	};

	/**
	 * @returns the client that was replaced
	 */
	replace(next: DeviceClient | null): DeviceClient | null {
		const previous = this.client;
		this.client = next;
		return previous;
	}
}
