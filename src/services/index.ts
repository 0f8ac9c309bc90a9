export { ConfigService, getConfigService } from "./ConfigService";
export {
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	createErrorHandler,
	getErrorHandler,
	type ErrorContext,
	type ErrorHandlerOptions,
	type FatalHook,
	type RecoveryStrategy,
} from "./ErrorHandler";
