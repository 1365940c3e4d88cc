/**
 * Structured Logging Module
 *
 * JSON Lines logging for analysis runs. Entries go to an optional log file
 * and, above a threshold, to stderr so they never mix with report output.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Log entry structure
 */
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Minimum level written anywhere (default: info) */
	level?: LogLevel;
	/** Append entries to this file as JSON Lines */
	logFile?: string;
	/** Enable stderr output (default: true) */
	console?: boolean;
	/** Drop every entry (tests) */
	silent?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured logger
 */
export class Logger {
	private readonly level: LogLevel;
	private readonly logFile?: string;
	private readonly consoleEnabled: boolean;
	private readonly silent: boolean;
	private readonly baseContext: Record<string, unknown>;

	constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
		this.level = config.level ?? 'info';
		this.logFile = config.logFile;
		this.consoleEnabled = config.console ?? true;
		this.silent = config.silent ?? false;
		this.baseContext = baseContext;

		if (this.logFile && !this.silent) {
			fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
		}
	}

	/**
	 * Logger that carries extra context on every entry
	 */
	child(context: Record<string, unknown>): Logger {
		return new Logger(
			{ level: this.level, logFile: this.logFile, console: this.consoleEnabled, silent: this.silent },
			{ ...this.baseContext, ...context }
		);
	}

	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (this.silent || LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
			return;
		}

		const merged = { ...this.baseContext, ...(context ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			context: Object.keys(merged).length > 0 ? merged : undefined,
		};

		const line = JSON.stringify(entry) + '\n';

		if (this.logFile) {
			try {
				fs.appendFileSync(this.logFile, line, 'utf8');
			} catch (error) {
				// Fall back to stderr if the file write fails
				process.stderr.write(`[LOGGER ERROR] Failed to write log: ${String(error)}\n`);
			}
		}

		if (this.consoleEnabled) {
			process.stderr.write(line);
		}
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}
}

/**
 * Logger that writes nothing
 */
export const silentLogger = new Logger({ silent: true });
