export { cleanupTerminal } from "./terminal";
export {
	Logger,
	getLogger,
	configureLogger,
	type LoggerConfig,
} from "./Logger";
export { LogLevel } from "../config/logging";
export {
	LogWriter,
	getLogWriter,
	type LogWriterConfig,
} from "./LogWriter";
