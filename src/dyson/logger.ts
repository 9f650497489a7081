// src/dyson/logger.ts

/**
 * Very small logger interface so callers can pass their own host logger
 * (anything with printf-style debug/info/warn/error) or rely on console.* here.
 */
export interface DysonLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
	/** Print debug lines, decrypted credential text included. Off by default. */
	debug?: boolean;
}

// The prefix is folded into the message so %s/%d/%o placeholders still apply.
export function consoleLogger(prefix: string, options: ConsoleLoggerOptions = {}): DysonLogger {
	return {
		debug: options.debug
			? (message: string, ...args: unknown[]) => console.debug(`${prefix} ${message}`, ...args)
			: () => undefined,
		info: (message: string, ...args: unknown[]) =>
			console.info(`${prefix} ${message}`, ...args),
		warn: (message: string, ...args: unknown[]) =>
			console.warn(`${prefix} ${message}`, ...args),
		error: (message: string, ...args: unknown[]) =>
			console.error(`${prefix} ${message}`, ...args),
	};
}

export const silentLogger: DysonLogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
