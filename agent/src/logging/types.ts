/**
 * Logger contract used across the device core.
 *
 * Components depend on this interface rather than on winston directly so
 * tests can hand in `jest.fn()` doubles.
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
	debug(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	error(message: string, meta?: LogMeta): void;
}

export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
