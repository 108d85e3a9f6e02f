import { createMessageHandler } from '../../../src/telemetry/message-handler';
import { MessageAcknowledgement } from '../../../src/transport/types';
import { createMockLogger, loggedMessages } from '../../helpers/mock-logger';

const TOPIC = 'devices/device-1/messages/commands/priority=high';

describe('createMessageHandler', () => {
	it('logs and completes a UTF-8 message', async () => {
		const logger = createMockLogger();
		const handler = createMessageHandler(logger);

		const ack = await handler({ topic: TOPIC, payload: Buffer.from('reboot now'), properties: { priority: 'high' } });

		expect(ack).toBe(MessageAcknowledgement.COMPLETE);
		expect(loggedMessages(logger, 'info')).toEqual([
			'Received message: [reboot now]',
			'Completed message [reboot now]',
		]);
		expect(logger.info.firstCall.args[1]).toMatchObject({ properties: { priority: 'high' } });
	});

	it('rejects a payload that is not valid UTF-8', async () => {
		const logger = createMockLogger();
		const handler = createMessageHandler(logger);

		const ack = await handler({ topic: TOPIC, payload: Buffer.from([0xff, 0xfe, 0xfd]), properties: {} });

		expect(ack).toBe(MessageAcknowledgement.REJECT);
		expect(loggedMessages(logger, 'warn')).toEqual(['Received a message that is not valid UTF-8; rejecting it']);
	});

	it('rejects an empty payload', async () => {
		const logger = createMockLogger();
		const handler = createMessageHandler(logger);

		const ack = await handler({ topic: TOPIC, payload: Buffer.alloc(0), properties: {} });

		expect(ack).toBe(MessageAcknowledgement.REJECT);
		expect(logger.info.notCalled).toBe(true);
	});
});
