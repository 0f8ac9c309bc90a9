/**
 * viewloop
 * Module-level API over one shared Application: init a view, run the loop,
 * and stop or change views from anywhere (including a view's own handler).
 */

import type { EventSource } from "./events";
import { notInitialized } from "./errors";
import { Application } from "./lifecycle/Application";
import { getConfigService } from "./services/ConfigService";
import { DEFAULT_APP_CONFIG, type AppConfig } from "./schemas/config";
import type { TerminalBackend } from "./terminal/TerminalBackend";
import { TerminalKitBackend } from "./terminal/TerminalKitBackend";
import { TerminalKitEventSource } from "./terminal/TerminalKitEventSource";
import { getDefaultTerminal, type TerminalLike } from "./terminal/termkit";
import type { View } from "./view";

export interface RunOptions {
	/** Where frames are drawn (default: terminal-kit on the process terminal) */
	backend?: TerminalBackend;
	/** Where input comes from (default: terminal-kit key and resize events) */
	events?: EventSource;
	/** Settings for the default backend and event source (default: the config file) */
	config?: Partial<AppConfig>;
	/** Terminal the defaults are built on */
	terminal?: TerminalLike;
}

let application: Application | null = null;

/**
 * The shared Application, created on first use
 */
export function getApplication(): Application {
	if (!application) {
		application = new Application();
	}
	return application;
}

/**
 * Drop the shared Application so the next call starts from scratch (for testing)
 */
export function resetApplication(): void {
	application = null;
}

/**
 * Make `view` the active view and mark the application running.
 * Only the first call has any effect.
 */
export function init(view: View): Promise<void> {
	return getApplication().init(view);
}

/**
 * Run the render / event loop until stop() is called.
 * Event sources created here are closed when the loop ends.
 * @throws LifecycleError NOT_INITIALIZED before init()
 */
export async function run(options: RunOptions = {}): Promise<void> {
	const app = getApplication();
	if (!(await app.store.isInitialized())) {
		notInitialized("run");
	}

	// The config file is only consulted when a default collaborator is built from it
	const needsDefaults = !options.backend || !options.events;
	const base =
		needsDefaults && !options.config
			? await getConfigService().loadConfig()
			: DEFAULT_APP_CONFIG;
	const config: AppConfig = { ...base, ...options.config };
	let terminal = options.terminal;
	const term = (): TerminalLike => {
		terminal ??= getDefaultTerminal();
		return terminal;
	};

	const backend =
		options.backend ??
		new TerminalKitBackend(term(), { alternateScreen: config.alternateScreen });
	let ownedEvents: TerminalKitEventSource | null = null;
	let events: EventSource;
	if (options.events) {
		events = options.events;
	} else {
		ownedEvents = new TerminalKitEventSource(term(), config.maxQueuedEvents);
		events = ownedEvents;
	}

	try {
		await app.run({ backend, events });
	} finally {
		ownedEvents?.close();
	}
}

/**
 * Ask the loop to stop once the current iteration completes
 * @throws LifecycleError NOT_INITIALIZED before init()
 */
export function stop(): Promise<void> {
	return getApplication().stop();
}

/**
 * Queue `view` to replace the active view at the start of the next iteration.
 * Resolves false when another change is already queued.
 * @throws LifecycleError NOT_INITIALIZED before init()
 */
export function changeView(view: View): Promise<boolean> {
	return getApplication().changeView(view);
}

/**
 * @throws LifecycleError NOT_INITIALIZED before init()
 */
export function isRunning(): Promise<boolean> {
	return getApplication().isRunning();
}

export { Application, type ApplicationOptions, type RunIO } from "./lifecycle/Application";
export { ApplicationStore, RwLock, PendingViewSwap } from "./state";
export type { StoreSnapshot, LockState, WriteGuard } from "./state";
export { LifecycleError, isLifecycleError, type LifecycleErrorCode } from "./errors";
export {
	QueuedEventSource,
	getLifecycleEventBus,
	type EventSource,
	type LifecycleEventMap,
} from "./events";
export { FrameBuffer, type Cell } from "./terminal/FrameBuffer";
export type { Frame, TerminalBackend, TerminalSurface } from "./terminal/TerminalBackend";
export { TerminalKitBackend } from "./terminal/TerminalKitBackend";
export { TerminalKitEventSource } from "./terminal/TerminalKitEventSource";
export { describeView, type View, type ViewContext } from "./view";
export type { AppEvent, KeyEvent, ResizeEvent, Rect, Style } from "./types";
export type { AppConfig } from "./schemas/config";
