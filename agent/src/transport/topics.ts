/**
 * MQTT topic layout for a device identity.
 *
 * Message properties travel in the last topic level as a URL-encoded
 * property bag, e.g. `devices/d1/messages/events/temperatureAlert=true`.
 */

export interface DeviceTopics {
	telemetry: string;
	commands: string;
	commandsFilter: string;
	twinGet: string;
	twinResponsePrefix: string;
	twinResponseFilter: string;
	twinDesired: string;
	twinReported: string;
}

export function deviceTopics(deviceId: string): DeviceTopics {
	const base = `devices/${deviceId}`;
	return {
		telemetry: `${base}/messages/events`,
		commands: `${base}/messages/commands`,
		commandsFilter: `${base}/messages/commands/#`,
		twinGet: `${base}/twin/get`,
		twinResponsePrefix: `${base}/twin/res/`,
		twinResponseFilter: `${base}/twin/res/+`,
		twinDesired: `${base}/twin/desired`,
		twinReported: `${base}/twin/reported`,
	};
}

export function encodePropertyBag(properties: Record<string, string>): string {
	return new URLSearchParams(properties).toString();
}

export function decodePropertyBag(encoded: string): Record<string, string> {
	const properties: Record<string, string> = {};
	for (const [key, value] of new URLSearchParams(encoded)) {
		properties[key] = value;
	}
	return properties;
}

export function telemetryTopic(topics: DeviceTopics, properties: Record<string, string>): string {
	const bag = encodePropertyBag(properties);
	return bag ? `${topics.telemetry}/${bag}` : topics.telemetry;
}

/**
 * Property bag of a cloud-to-device topic, or null if the topic is not one.
 */
export function parseCommandTopic(topics: DeviceTopics, topic: string): Record<string, string> | null {
	if (topic === topics.commands) {
		return {};
	}
	if (!topic.startsWith(`${topics.commands}/`)) {
		return null;
	}
	return decodePropertyBag(topic.slice(topics.commands.length + 1));
}
