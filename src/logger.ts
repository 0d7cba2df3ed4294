/**
 * Logger utilities for demand-streams - Structured logging integration
 */

import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Default console logger implementation.
 * Prefixes every line with the operator name and drops anything below the
 * configured level.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger("Buffer", "warn")
 * logger.warn("overflow after %d values", 3) // [Buffer] overflow after 3 values
 * logger.debug("ignored")
 * ```
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;

	constructor(
		name: string,
		level: LogLevel = "info",
		private readonly sink: Pick<Console, LogLevel> = console,
	) {
		this.prefix = `[${name}]`;
		this.threshold = LEVELS[level];
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
		if (LEVELS[level] < this.threshold) return;
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
 * Resolve the logger an operator writes to: an explicit logger wins, a bare
 * level gets a console logger, and nothing at all means silence.
 */
export function createLogger(
	name: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	if (level) return new ConsoleLogger(name, level);
	return new NoOpLogger();
}
