export * from "./constants";
export { colors, colorSchemes } from "./colors";
export {
	LogLevel,
	getLoggingConfig,
	parseLogLevel,
	type LoggingConfig,
} from "./logging";
