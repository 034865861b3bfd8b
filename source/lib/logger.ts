/**
 * Logger - Component-tagged logging.
 *
 * Provides multiple logger implementations:
 * - createLogger: Daily log files in a logs directory
 * - createConsoleLogger: Lines on stderr (containers, local runs)
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import path from 'node:path';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Get the path to today's log file.
 */
export function getLogPath(logsDir: string, now: Date = new Date()): string {
	const date = now.toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(logsDir, `${date}.log`);
}

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
	now: Date = new Date(),
): string {
	const timestamp = now.toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

function buildLogger(
	minLevel: LogLevel,
	write: (entry: string) => void,
): Logger {
	const threshold = LEVEL_ORDER[minLevel];

	function log(
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	) {
		if (LEVEL_ORDER[level] < threshold) return;
		write(formatEntry(level, component, message, extra));
	}

	return {
		debug(component: string, message: string, data?: object) {
			log('debug', component, message, data);
		},

		info(component: string, message: string, data?: object) {
			log('info', component, message, data);
		},

		warn(component: string, message: string, data?: object) {
			log('warn', component, message, data);
		},

		error(component: string, message: string, error?: Error) {
			log('error', component, message, error);
		},
	};
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a logger that writes to daily log files in `logsDir`.
 *
 * @example
 * const logger = createLogger('/var/log/find', 'info');
 * logger.warn('Search', 'Embedding unavailable, lexical only', {query});
 * // Appends to: /var/log/find/2024-01-11.log
 */
export function createLogger(
	logsDir: string,
	minLevel: LogLevel = 'info',
): Logger {
	return buildLogger(minLevel, entry => {
		try {
			// Recreated on every write: the directory may be rotated away
			fs.mkdirSync(logsDir, {recursive: true});
			fs.appendFileSync(getLogPath(logsDir), entry + '\n');
		} catch {
			// Unwritable log directory: fall back to stderr
			process.stderr.write(entry + '\n');
		}
	});
}

/**
 * Create a logger writing to stderr.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
	return buildLogger(minLevel, entry => {
		process.stderr.write(entry + '\n');
	});
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
