import type { IAppLifecycle } from "../interfaces";
import { SHUTDOWN_FLUSH_TIMEOUT_MS } from "../config/constants";
import { getLoggingConfig } from "../config/logging";
import { cleanupTerminal, getLogger } from "../utils";
import { getLogWriter } from "../utils/LogWriter";

const logger = getLogger("AppLifecycle");

export interface AppLifecycleOptions {
	/** Emitter the handlers are installed on (default: process) */
	target?: NodeJS.EventEmitter;
	/** Terminates the process (default: process.exit) */
	exit?: (code: number) => void;
	/** Last-resort terminal restore (default: cleanupTerminal) */
	restoreTerminal?: () => void;
	/** Writes out buffered logs (default: the shared LogWriter) */
	flushLogs?: () => Promise<void>;
	/** Upper bound on the log flush during shutdown */
	flushTimeoutMs?: number;
}

const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

function flushSharedLogWriter(): Promise<void> {
	const { logDir, fileLogging } = getLoggingConfig();
	return getLogWriter({ logDir, enabled: fileLogging }).shutdown();
}

/**
 * Application Lifecycle Manager
 * Restores the terminal and flushes logs when the process is killed or crashes
 * outside the run loop's own release path.
 */
export class AppLifecycle implements IAppLifecycle {
	private _exiting = false;
	private readonly target: NodeJS.EventEmitter;
	private readonly terminate: (code: number) => void;
	private readonly restoreTerminal: () => void;
	private readonly flushLogs: () => Promise<void>;
	private readonly flushTimeoutMs: number;
	private readonly installed: Array<{
		event: string;
		listener: (...args: unknown[]) => void;
	}> = [];

	constructor(options: AppLifecycleOptions = {}) {
		this.target = options.target ?? process;
		this.terminate = options.exit ?? ((code) => process.exit(code));
		this.restoreTerminal = options.restoreTerminal ?? (() => cleanupTerminal());
		this.flushLogs = options.flushLogs ?? flushSharedLogWriter;
		this.flushTimeoutMs = options.flushTimeoutMs ?? SHUTDOWN_FLUSH_TIMEOUT_MS;
	}

	get exiting(): boolean {
		return this._exiting;
	}

	setupSignalHandlers(): void {
		if (this.installed.length > 0) return;

		for (const signal of TERMINATION_SIGNALS) {
			this.install(signal, () => {
				logger.info(`Received ${signal}, shutting down`);
				void this.exit(0);
			});
		}

		this.install("uncaughtException", (error) => {
			logger.error("Uncaught exception:", error);
			void this.exit(1);
		});

		this.install("unhandledRejection", (reason) => {
			logger.error("Unhandled rejection:", reason);
			void this.exit(1);
		});

		// Final synchronous restore on process exit
		this.install("exit", () => {
			this.restoreTerminal();
		});
	}

	/**
	 * Gracefully exit the application. Later calls are ignored.
	 */
	async exit(code = 0): Promise<void> {
		if (this._exiting) return;
		this._exiting = true;

		await this.cleanup();
		this.terminate(code);
	}

	async cleanup(): Promise<void> {
		logger.debug("Cleaning up resources...");

		try {
			this.restoreTerminal();
		} catch (e) {
			logger.warn("Terminal restore failed:", e);
		}

		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<void>((resolve) => {
			timer = setTimeout(resolve, this.flushTimeoutMs);
		});

		try {
			await Promise.race([this.flushLogs(), timeout]);
		} catch (e) {
			// The logger cannot report its own failure
			console.error("Failed to flush logs:", e);
		} finally {
			clearTimeout(timer);
		}
	}

	dispose(): void {
		for (const { event, listener } of this.installed) {
			this.target.removeListener(event, listener);
		}
		this.installed.length = 0;
	}

	private install(event: string, listener: (...args: unknown[]) => void): void {
		this.target.once(event, listener);
		this.installed.push({ event, listener });
	}
}
