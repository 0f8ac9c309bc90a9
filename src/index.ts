#!/usr/bin/env node
import { init, run } from "./app";
import { WelcomeView } from "./components";
import { colorSchemes, parseLogLevel } from "./config";
import { AppLifecycle } from "./lifecycle/AppLifecycle";
import { ErrorCategory, createErrorHandler, getConfigService } from "./services";
import { cleanupTerminal, configureLogger, getLogger } from "./utils";

const logger = getLogger("Main");

/**
 * Main entry point
 * Loads config, installs the crash guard, and runs the demo views
 */
async function main(): Promise<void> {
	const config = await getConfigService().loadConfig();
	if (!process.env.VIEWLOOP_LOG_LEVEL) {
		configureLogger({ level: parseLogLevel(config.logLevel) });
	}

	const lifecycle = new AppLifecycle();
	lifecycle.setupSignalHandlers();

	const errors = createErrorHandler({ onFatal: () => lifecycle.exit(1) });
	// The run loop's own release failed, so the tty may still be raw
	errors.registerRecoveryStrategy(ErrorCategory.TERMINAL, (_error, context) => {
		if (context.operation === "run (release)") {
			cleanupTerminal();
		}
	});

	try {
		await init(new WelcomeView(colorSchemes[config.theme]));
		await run({ config });
	} catch (error) {
		await errors.handleRunFailure(error);
		return;
	}

	logger.debug("Demo finished");
	// terminal-kit keeps stdin referenced, so leave explicitly
	await lifecycle.exit(0);
}

main().catch((error: unknown) => {
	logger.error("Fatal error in main:", error);
	process.exit(1);
});
