/**
 * Simple structured logger with log levels.
 * The threshold is read from the converter config on every call.
 */

import { type LogLevel, getConfig } from "./config";

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export const createLogger = (namespace: string) => {
	const shouldLog = (level: LogLevel): boolean => {
		return LOG_LEVELS[level] >= LOG_LEVELS[getConfig().logLevel];
	};

	return {
		debug: (...args: unknown[]) => {
			if (shouldLog("debug")) console.log(`[${namespace}]`, ...args);
		},
		info: (...args: unknown[]) => {
			if (shouldLog("info")) console.log(`[${namespace}]`, ...args);
		},
		warn: (...args: unknown[]) => {
			if (shouldLog("warn")) console.warn(`[${namespace}]`, ...args);
		},
		error: (...args: unknown[]) => {
			if (shouldLog("error")) console.error(`[${namespace}]`, ...args);
		},
	};
};

export type Logger = ReturnType<typeof createLogger>;
