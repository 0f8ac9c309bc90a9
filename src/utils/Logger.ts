/**
 * Logger Service
 * Leveled, context-tagged logging to the console and a rotating log file
 */

import { getLogWriter, type LogWriter } from "./LogWriter";
import { getLoggingConfig, LogLevel } from "../config/logging";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
}

const loggingConfig = getLoggingConfig();

const DEFAULT_CONFIG: LoggerConfig = {
	level: loggingConfig.level,
	enableTimestamps: true,
	enableColors: true,
	enableFileLogging: loggingConfig.fileLogging,
	enableConsoleLogging: loggingConfig.consoleLogging,
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

function paint(enabled: boolean, color: string, text: string): string {
	return enabled ? `${color}${text}${colors.reset}` : text;
}

function describeData(data: unknown, pretty: boolean): string {
	if (data instanceof Error) {
		return data.stack ?? `${data.name}: ${data.message}`;
	}
	if (typeof data === "object" && data !== null) {
		try {
			return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
		} catch {
			return String(data);
		}
	}
	return String(data);
}

/**
 * Logger with levels and a context tag.
 * Child loggers share their parent's settings, so setLevel() on the
 * global logger applies everywhere.
 */
export class Logger {
	private readonly config: LoggerConfig;
	private readonly context: string;
	private logWriter: LogWriter | null = null;

	constructor(
		context: string = "App",
		config: Partial<LoggerConfig> = {},
		shared?: LoggerConfig,
	) {
		this.context = context;
		this.config = shared ?? { ...DEFAULT_CONFIG, ...config };
	}

	/**
	 * Create a child logger with a different context
	 */
	child(context: string): Logger {
		return new Logger(context, {}, this.config);
	}

	/**
	 * Set the minimum log level
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	/**
	 * Apply new settings to this logger and every child sharing them
	 */
	configure(config: Partial<LoggerConfig>): void {
		Object.assign(this.config, config);
	}

	/**
	 * Console line: short timestamp, level, context, message
	 */
	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const useColor = this.config.enableColors;
		const parts: string[] = [];

		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(paint(useColor, colors.gray, `[${timestamp}]`));
		}
		parts.push(paint(useColor, color, level.padEnd(5)));
		parts.push(paint(useColor, colors.cyan, `[${this.context}]`));
		parts.push(message);

		if (data !== undefined) {
			parts.push(`\n${paint(useColor, colors.dim, describeData(data, true))}`);
		}

		return parts.join(" ");
	}

	/**
	 * File line: full ISO timestamp, no colors, single line data
	 */
	private formatPlain(level: string, message: string, data?: unknown): string {
		const parts = [
			new Date().toISOString(),
			`[${level}]`,
			`[${this.context}]`,
			message,
		];
		if (data !== undefined) {
			parts.push(describeData(data, false));
		}
		return parts.join(" ");
	}

	private writer(): LogWriter | null {
		if (!this.config.enableFileLogging) return null;
		if (!this.logWriter) {
			this.logWriter = getLogWriter({ logDir: loggingConfig.logDir });
		}
		return this.logWriter;
	}

	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		if (this.config.level > level) return;

		if (this.config.enableConsoleLogging) {
			const consoleMessage = this.format(levelStr, message, color, data);
			const consoleMethod =
				level === LogLevel.ERROR
					? console.error
					: level === LogLevel.WARN
						? console.warn
						: console.log;
			consoleMethod(consoleMessage);
		}

		this.writer()?.write(this.formatPlain(levelStr, message, data));
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	error(message: string, error?: unknown): void {
		this.log(LogLevel.ERROR, "ERROR", colors.red, message, error);
	}
}

let globalLogger: Logger | null = null;

/**
 * Get the global logger, or a child of it tagged with `context`
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("App");
	}
	return context ? globalLogger.child(context) : globalLogger;
}

/**
 * Configure the global logger (and every child logger already handed out)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
	getLogger().configure(config);
}
