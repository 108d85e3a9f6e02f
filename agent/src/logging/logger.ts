/**
 * Device Logger
 * Wrapper around Winston for application logging
 */

import winston from 'winston';
import type { LogMeta, Logger } from './types';

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
	level?: string;
	format?: LogFormat;
	service?: string;
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ timestamp, level, message, service, operation, step, ...meta }) => {
	let prefix = '';
	if (operation) {
		prefix = `[${String(operation)}]`;
		if (step) {
			prefix += ` ${String(step)} ->`;
		}
		prefix += ' ';
	}

	const metaStr = Object.keys(meta).length > 0
		? ' ' + JSON.stringify(meta)
		: '';

	return `${String(timestamp)} [${level}] ${String(service)}: ${prefix}${String(message)}${metaStr}`;
});

/**
 * Create the process logger. JSON lines by default, colorized single-line
 * output when `format` is 'pretty'.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
	const format = options.format ?? 'json';

	return winston.createLogger({
		level: options.level ?? 'info',
		format: winston.format.combine(
			winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
			winston.format.errors({ stack: true }),
			winston.format.splat(),
			format === 'pretty' ? prettyFormat : winston.format.json()
		),
		defaultMeta: { service: options.service ?? 'device-link' },
		transports: [
			new winston.transports.Console({
				format: format === 'pretty'
					? winston.format.combine(winston.format.colorize(), prettyFormat)
					: winston.format.json(),
			}),
		],
	});
}

export interface OperationLogger {
	start(operation: string, message: string, meta?: LogMeta): void;
	complete(operation: string, message: string, meta?: LogMeta): void;
	error(operation: string, message: string, error: unknown, meta?: LogMeta): void;
}

// Helper functions for structured logging with visual grouping
export function createOperationLogger(logger: Logger): OperationLogger {
	return {
		start: (operation, message, meta) => {
			logger.debug(message, { ...meta, operation, step: 'START' });
		},

		complete: (operation, message, meta) => {
			logger.debug(message, { ...meta, operation, step: 'DONE' });
		},

		error: (operation, message, error, meta) => {
			const err = toError(error);
			logger.error(message, { ...meta, operation, step: 'ERROR', error: err.message, stack: err.stack });
		},
	};
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
