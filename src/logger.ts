/**
 * Logger utilities for scopeline - Structured logging integration
 */

import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * The console methods a ConsoleLogger writes to.
 */
export type LogSink = Pick<Console, LogLevel>;

/**
 * Default console logger implementation.
 * Prefixes every line with the scope name and drops lines below `level`.
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;
	private readonly sink: LogSink;

	constructor(scopeName: string, level: LogLevel = "info", sink?: LogSink) {
		this.prefix = `[${scopeName}]`;
		this.threshold = LEVELS[level];
		this.sink = sink ?? console;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return LEVELS[level] >= this.threshold;
	}

	debug(message: string, ...args: unknown[]): void {
		this.write("debug", message, args);
	}

	info(message: string, ...args: unknown[]): void {
		this.write("info", message, args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write("warn", message, args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write("error", message, args);
	}

	private write(level: LogLevel, message: string, args: unknown[]): void {
		if (!this.isLevelEnabled(level)) return;
		this.sink[level](`${this.prefix} ${message}`, ...args);
	}
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Create a logger instance based on options.
 * An explicit logger wins; a level alone selects the console logger.
 */
export function createLogger(
	scopeName: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	if (level) return new ConsoleLogger(scopeName, level);
	return new NoOpLogger();
}
