/**
 * Codes for lifecycle misuse. These indicate integration bugs,
 * not runtime conditions, and are never recovered from.
 */
export type LifecycleErrorCode =
	| "NOT_INITIALIZED"
	| "ALREADY_RUNNING"
	| "REENTRANT_LOCK";

/**
 * Error thrown when the application core is used out of order
 */
export class LifecycleError extends Error {
	override readonly name = "LifecycleError";
	readonly code: LifecycleErrorCode;

	constructor(code: LifecycleErrorCode, message?: string) {
		super(message ?? code);
		this.code = code;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, LifecycleError);
		}
	}
}

/**
 * Throw the error raised when state is touched before `init()`
 */
export function notInitialized(operation: string): never {
	throw new LifecycleError(
		"NOT_INITIALIZED",
		`${operation}: application is not initialized. Did you call init()?`,
	);
}

/**
 * Check whether a value is a LifecycleError, optionally with a given code
 */
export function isLifecycleError(
	error: unknown,
	code?: LifecycleErrorCode,
): error is LifecycleError {
	return (
		error instanceof LifecycleError && (code === undefined || error.code === code)
	);
}
