/**
 * LogWriter - Handles file-based logging with rotation and buffering
 *
 * - Buffered appends, flushed on an interval or when the buffer grows large
 * - Size-based log rotation (viewloop.log -> viewloop.log.1 -> ...)
 * - The flush timer never keeps the process alive
 */

import { existsSync, mkdirSync, statSync } from "node:fs";
import { appendFile, rename, unlink } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { APP_NAME } from "../config/constants";

export interface LogWriterConfig {
	/** Directory where log files are stored */
	logDir: string;
	/** Log file name */
	filename: string;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Interval in milliseconds to flush buffered logs */
	flushInterval: number;
	/** Lines buffered before an immediate flush */
	maxBufferedLines: number;
	/** Whether logging is enabled */
	enabled: boolean;
}

const DEFAULT_CONFIG: LogWriterConfig = {
	logDir: join(homedir(), `.${APP_NAME}`, "logs"),
	filename: `${APP_NAME}.log`,
	maxFileSize: 5 * 1024 * 1024, // 5MB
	maxFiles: 5,
	flushInterval: 1000,
	maxBufferedLines: 100,
	enabled: true,
};

export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private flushing: Promise<void> | null = null;
	private initialized = false;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...DEFAULT_CONFIG, ...config };
		this.initialize();
	}

	/**
	 * Create the log directory and start the flush timer
	 */
	private initialize(): void {
		if (!this.config.enabled) {
			return;
		}

		try {
			mkdirSync(this.config.logDir, { recursive: true });

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err: unknown) => {
					console.error("Log flush error:", err);
				});
			}, this.config.flushInterval);
			this.flushTimer.unref();

			this.initialized = true;
		} catch (error) {
			// Logging must never take the application down
			console.error("Failed to initialize LogWriter:", error);
			this.config.enabled = false;
		}
	}

	getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Buffer one log line
	 */
	write(message: string): void {
		if (!this.config.enabled || !this.initialized) {
			return;
		}

		this.buffer.push(message.endsWith("\n") ? message : `${message}\n`);

		if (this.buffer.length > this.config.maxBufferedLines) {
			this.flush().catch((err: unknown) => {
				console.error("Log flush error:", err);
			});
		}
	}

	/**
	 * Append buffered lines to the log file.
	 * Concurrent callers wait for the flush already in progress.
	 */
	async flush(): Promise<void> {
		if (this.flushing) {
			await this.flushing;
		}
		if (!this.config.enabled || this.buffer.length === 0) {
			return;
		}

		const content = this.buffer.join("");
		this.buffer = [];

		this.flushing = this.append(content);
		try {
			await this.flushing;
		} finally {
			this.flushing = null;
		}
	}

	private async append(content: string): Promise<void> {
		try {
			await appendFile(this.getLogFilePath(), content, "utf-8");
			this.currentSize += Buffer.byteLength(content, "utf-8");

			if (this.currentSize >= this.config.maxFileSize) {
				await this.rotate();
			}
		} catch (error) {
			console.error("Log flush failed:", error);
		}
	}

	/**
	 * Shift viewloop.log.N -> .N+1, dropping the oldest, then move the live file to .1
	 */
	private async rotate(): Promise<void> {
		try {
			for (let i = this.config.maxFiles; i > 0; i--) {
				const currentRotated = this.getRotatedLogFilePath(i);
				if (!existsSync(currentRotated)) continue;

				if (i === this.config.maxFiles) {
					await unlink(currentRotated);
				} else {
					await rename(currentRotated, this.getRotatedLogFilePath(i + 1));
				}
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				await rename(logFile, this.getRotatedLogFilePath(1));
			}

			this.currentSize = 0;
		} catch (error) {
			console.error("Log rotation failed:", error);
		}
	}

	/**
	 * Stop the flush timer and write out whatever is buffered
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		await this.flush();
	}
}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let instance: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!instance) {
		instance = new LogWriter(config);
	}
	return instance;
}
