/**
 * Application Lifecycle Interface
 * Crash guard: signal handlers, terminal restore, and log flush before exit
 */

export interface IAppLifecycle {
	/**
	 * Install process signal and crash handlers
	 */
	setupSignalHandlers(): void;

	/**
	 * Restore the terminal, flush logs, and terminate with `code`
	 */
	exit(code?: number): Promise<void>;

	/**
	 * Restore the terminal and flush logs without exiting
	 */
	cleanup(): Promise<void>;

	/**
	 * Remove every handler installed by setupSignalHandlers()
	 */
	dispose(): void;
}
