import { isLifecycleError, runPhaseOf } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Info - non-blocking, informational */
	INFO = "info",
	/** Warning - degraded functionality but app continues */
	WARNING = "warning",
	/** Error - feature broken but app recoverable */
	ERROR = "error",
	/** Fatal - app must exit */
	FATAL = "fatal",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** Terminal acquire / draw / release failures */
	TERMINAL = "terminal",
	/** Event source failures */
	INPUT = "input",
	/** Failures raised by a view's render or event handler */
	VIEW = "view",
	/** Misuse of the lifecycle API (not initialized, re-entered run, reentrant lock) */
	LIFECYCLE = "lifecycle",
	/** Configuration load / save failures */
	CONFIG = "config",
	/** Unknown errors */
	UNKNOWN = "unknown",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity: ErrorSeverity;
	operation?: string; // What was being attempted
	metadata?: Record<string, unknown>;
	recoverable?: boolean;
}

/**
 * Recovery strategy function
 */
export type RecoveryStrategy = (
	error: Error,
	context: ErrorContext,
) => Promise<void> | void;

/**
 * Called once a fatal error has been logged and recovery has run
 */
export type FatalHook = (error: Error, context: ErrorContext) => void | Promise<void>;

export interface ErrorHandlerOptions {
	onFatal?: FatalHook;
}

const exitProcess: FatalHook = () => {
	process.exit(1);
};

/**
 * Centralized Error Handler
 * Consistent logging and recovery strategies per category
 */
export class ErrorHandler {
	private recoveryStrategies: Map<ErrorCategory, RecoveryStrategy[]> =
		new Map();
	private readonly onFatal: FatalHook;

	constructor(options: ErrorHandlerOptions = {}) {
		this.onFatal = options.onFatal ?? exitProcess;
	}

	/**
	 * Register a recovery strategy for a specific error category
	 */
	registerRecoveryStrategy(
		category: ErrorCategory,
		strategy: RecoveryStrategy,
	): void {
		const strategies = this.recoveryStrategies.get(category) ?? [];
		strategies.push(strategy);
		this.recoveryStrategies.set(category, strategies);
	}

	/**
	 * Handle an error with context
	 */
	async handle(error: unknown, context: ErrorContext): Promise<void> {
		const err = this.normalizeError(error);

		this.logError(err, context);

		if (context.recoverable !== false) {
			await this.executeRecoveryStrategies(err, context);
		}

		if (context.severity === ErrorSeverity.FATAL) {
			logger.error("Fatal error - application will exit:", err);
			await this.onFatal(err, context);
		}
	}

	/**
	 * Category for a failure that escaped the run loop, from the loop step it was raised in
	 */
	classify(error: unknown): ErrorCategory {
		if (isLifecycleError(error)) {
			return ErrorCategory.LIFECYCLE;
		}

		switch (runPhaseOf(error)) {
			case "acquire":
			case "draw":
			case "release":
				return ErrorCategory.TERMINAL;
			case "read":
				return ErrorCategory.INPUT;
			case "render":
			case "dispatch":
				return ErrorCategory.VIEW;
			default:
				return ErrorCategory.UNKNOWN;
		}
	}

	/**
	 * Helper: a run loop failure ends the program once its category's
	 * recovery strategies have run
	 */
	async handleRunFailure(error: unknown): Promise<void> {
		const phase = runPhaseOf(error);
		await this.handle(error, {
			category: this.classify(error),
			severity: ErrorSeverity.FATAL,
			operation: phase ? `run (${phase})` : "run",
			recoverable: true,
		});
	}

	/**
	 * Helper: Handle config errors (defaults remain in effect)
	 */
	async handleConfigError(error: unknown, operation: string): Promise<void> {
		await this.handle(error, {
			category: ErrorCategory.CONFIG,
			severity: ErrorSeverity.WARNING,
			operation,
			recoverable: true,
		});
	}

	/**
	 * Normalize unknown errors to Error objects
	 */
	private normalizeError(error: unknown): Error {
		if (error instanceof Error) {
			return error;
		}
		if (typeof error === "string") {
			return new Error(error);
		}
		return new Error(String(error));
	}

	private logError(error: Error, context: ErrorContext): void {
		const logMessage = `[${context.category}] ${context.operation || "Unknown operation"}: ${error.message}`;
		const metadata = context.metadata;

		switch (context.severity) {
			case ErrorSeverity.INFO:
				logger.info(logMessage, metadata);
				break;
			case ErrorSeverity.WARNING:
				logger.warn(logMessage, metadata);
				break;
			case ErrorSeverity.ERROR:
				logger.error(logMessage, metadata);
				break;
			case ErrorSeverity.FATAL:
				logger.error(`FATAL: ${logMessage}`, metadata);
				break;
		}
	}

	private async executeRecoveryStrategies(
		error: Error,
		context: ErrorContext,
	): Promise<void> {
		const strategies = this.recoveryStrategies.get(context.category);
		if (!strategies || strategies.length === 0) {
			return;
		}

		for (const strategy of strategies) {
			try {
				await strategy(error, context);
			} catch (recoveryError) {
				logger.error("Recovery strategy failed:", recoveryError);
			}
		}
	}

	/**
	 * Remove all recovery strategies
	 */
	dispose(): void {
		this.recoveryStrategies.clear();
	}
}

let instance: ErrorHandler | null = null;

export function getErrorHandler(): ErrorHandler {
	if (!instance) {
		instance = new ErrorHandler();
	}
	return instance;
}

/**
 * Create a new ErrorHandler instance (for testing)
 */
export function createErrorHandler(options?: ErrorHandlerOptions): ErrorHandler {
	return new ErrorHandler(options);
}
