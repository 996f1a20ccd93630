import pino from 'pino';
import type { LoggingConfig } from './config.js';

export type Logger = pino.Logger;

const STDERR = 2;

/** Logs go to stderr (or a file); stdout carries the status lines. */
export function createLogger(config?: Partial<LoggingConfig>): Logger {
	const level = config?.level ?? 'warn';
	const isJson = config?.json ?? process.env.NODE_ENV === 'production';

	if (config?.file != null) {
		return pino({ level }, pino.destination(config.file));
	}

	if (isJson) {
		return pino({ level }, pino.destination(STDERR));
	}

	return pino({
		level,
		transport: {
			target: 'pino-pretty',
			options: { colorize: true, translateTime: 'HH:MM:ss', destination: STDERR },
		},
	});
}

export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}
