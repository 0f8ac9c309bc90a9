/**
 * Logging settings read from the environment
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { APP_NAME } from "./constants";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	NONE = 4,
}

export interface LoggingConfig {
	level: LogLevel;
	/** Append to the rotating log file (VIEWLOOP_LOG_FILE, on unless "false") */
	fileLogging: boolean;
	/** Mirror to stdout/stderr (VIEWLOOP_LOG_CONSOLE, off unless "true") */
	consoleLogging: boolean;
	logDir: string;
}

const LEVELS_BY_NAME: Record<string, LogLevel> = {
	DEBUG: LogLevel.DEBUG,
	INFO: LogLevel.INFO,
	WARN: LogLevel.WARN,
	ERROR: LogLevel.ERROR,
	NONE: LogLevel.NONE,
};

/**
 * Level for a case-insensitive name; unknown or missing names mean INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
	return LEVELS_BY_NAME[(value ?? "").toUpperCase()] ?? LogLevel.INFO;
}

/**
 * Settings from VIEWLOOP_LOG_LEVEL, VIEWLOOP_LOG_FILE, VIEWLOOP_LOG_CONSOLE and VIEWLOOP_LOG_DIR
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
	return {
		level: parseLogLevel(env.VIEWLOOP_LOG_LEVEL),
		fileLogging: env.VIEWLOOP_LOG_FILE !== "false",
		consoleLogging: env.VIEWLOOP_LOG_CONSOLE === "true",
		logDir: env.VIEWLOOP_LOG_DIR || join(homedir(), `.${APP_NAME}`, "logs"),
	};
}
