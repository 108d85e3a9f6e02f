/**
 * Connection status model reported by a device client on every
 * connectivity change.
 */

export const ConnectionStatus = {
	CONNECTED: 'Connected',
	DISCONNECTED_RETRYING: 'DisconnectedRetrying',
	DISCONNECTED: 'Disconnected',
	DISABLED: 'Disabled',
} as const;

export type ConnectionStatus = typeof ConnectionStatus[keyof typeof ConnectionStatus];

export const ConnectionStatusChangeReason = {
	OK: 'Ok',
	BAD_CREDENTIAL: 'BadCredential',
	DEVICE_DISABLED: 'DeviceDisabled',
	RETRY_EXPIRED: 'RetryExpired',
	COMMUNICATION_ERROR: 'CommunicationError',
	CLIENT_CLOSED: 'ClientClosed',
	UNKNOWN: 'Unknown',
} as const;

export type ConnectionStatusChangeReason =
	typeof ConnectionStatusChangeReason[keyof typeof ConnectionStatusChangeReason];

export const RecommendedAction = {
	PERFORM_NORMALLY: 'PerformNormally',
	OPEN_CONNECTION: 'OpenConnection',
	WAIT_FOR_RETRY_POLICY: 'WaitForRetryPolicy',
	QUIT: 'Quit',
} as const;

export type RecommendedAction = typeof RecommendedAction[keyof typeof RecommendedAction];

export interface ConnectionState {
	status: ConnectionStatus;
	reason: ConnectionStatusChangeReason;
	recommendedAction: RecommendedAction;
}

/**
 * What a caller should do about a given status/reason pair.
 */
export function recommendedActionFor(
	status: ConnectionStatus,
	reason: ConnectionStatusChangeReason
): RecommendedAction {
	switch (status) {
		case ConnectionStatus.CONNECTED:
			return RecommendedAction.PERFORM_NORMALLY;
		case ConnectionStatus.DISCONNECTED_RETRYING:
			return RecommendedAction.WAIT_FOR_RETRY_POLICY;
		case ConnectionStatus.DISABLED:
			return RecommendedAction.QUIT;
		case ConnectionStatus.DISCONNECTED:
			if (
				reason === ConnectionStatusChangeReason.BAD_CREDENTIAL ||
				reason === ConnectionStatusChangeReason.DEVICE_DISABLED
			) {
				return RecommendedAction.QUIT;
			}
			return RecommendedAction.OPEN_CONNECTION;
	}
}

export function connectionState(
	status: ConnectionStatus,
	reason: ConnectionStatusChangeReason
): ConnectionState {
	return { status, reason, recommendedAction: recommendedActionFor(status, reason) };
}

export function describeConnectionState(state: ConnectionState): string {
	return `status=${state.status}, reason=${state.reason}, recommendation=${state.recommendedAction}`;
}
