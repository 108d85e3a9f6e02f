import { TextDecoder } from 'util';
import { MessageAcknowledgement, type IncomingMessage } from '../transport/types';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Cloud-to-device message callback: logs the payload and its properties.
 * Payloads that are empty or not valid UTF-8 are rejected.
 */
export function createMessageHandler(logger: Logger): (message: IncomingMessage) => Promise<MessageAcknowledgement> {
	return async (message) => {
		let data: string;
		try {
			data = utf8.decode(message.payload);
		} catch {
			logger.warn('Received a message that is not valid UTF-8; rejecting it', {
				component: LogComponents.MESSAGES,
				topic: message.topic,
				bytes: message.payload.length,
			});
			return MessageAcknowledgement.REJECT;
		}

		if (data.length === 0) {
			logger.warn('Received an empty message; rejecting it', {
				component: LogComponents.MESSAGES,
				topic: message.topic,
			});
			return MessageAcknowledgement.REJECT;
		}

		logger.info(`Received message: [${data}]`, {
			component: LogComponents.MESSAGES,
			properties: message.properties,
		});
		logger.info(`Completed message [${data}]`, { component: LogComponents.MESSAGES });
		return MessageAcknowledgement.COMPLETE;
	};
}
