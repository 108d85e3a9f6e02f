/**
 * Conditions that end the whole device application.
 */

export class FatalConnectionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'FatalConnectionError';
	}
}

export class CredentialsExhaustedError extends FatalConnectionError {
	constructor() {
		super('No usable credentials remain; update the device keys and restart');
		this.name = 'CredentialsExhaustedError';
	}
}
