/**
 * Application Store
 * Shared runtime state: the running flag, the active view and the pending
 * view swap, each in its own reader/writer locked cell
 */

import { notInitialized } from "../errors";
import type { AppEvent } from "../types";
import type { View, ViewContext } from "../view";
import { PendingViewSwap } from "./PendingViewSwap";
import { RwLock } from "./RwLock";

export interface ApplicationState {
	isRunning: boolean;
}

/**
 * Result of installing a queued view
 */
export interface AppliedSwap {
	previous: View | null;
	next: View;
}

/**
 * Point-in-time view of the store (for diagnostics and tests)
 */
export interface StoreSnapshot {
	initialized: boolean;
	isRunning: boolean | null;
	hasView: boolean;
	swapPending: boolean;
}

export class ApplicationStore {
	private readonly application = new RwLock<ApplicationState | null>(
		null,
		"Application",
	);
	private readonly activeView = new RwLock<View | null>(null, "ActiveView");
	private readonly pending = new PendingViewSwap();

	/**
	 * Establish the running state and the initial view.
	 * Each cell is only filled if empty, so repeated calls keep the first
	 * view and running flag. Returns whether this call filled anything.
	 */
	async initialize(initialView: View): Promise<boolean> {
		const viewSet = await this.activeView.write((guard) => {
			if (guard.value !== null) return false;
			guard.value = initialView;
			return true;
		});

		const stateSet = await this.application.write((guard) => {
			if (guard.value !== null) return false;
			guard.value = { isRunning: true };
			return true;
		});

		return viewSet || stateSet;
	}

	isInitialized(): Promise<boolean> {
		return this.application.read((state) => state !== null);
	}

	/**
	 * Read the running flag
	 * @throws LifecycleError NOT_INITIALIZED before initialize()
	 */
	readIsRunning(): Promise<boolean> {
		return this.application.read((state) => {
			if (!state) notInitialized("isRunning");
			return state.isRunning;
		});
	}

	/**
	 * Clear the running flag; the loop exits after the current iteration
	 * @throws LifecycleError NOT_INITIALIZED before initialize()
	 */
	requestStop(): Promise<void> {
		return this.application.write((guard) => {
			if (!guard.value) notInitialized("stop");
			guard.value.isRunning = false;
		});
	}

	/**
	 * Call `fn` with the active view under a read lock held only for that call
	 */
	renderCurrentView<R>(fn: (view: View) => R | Promise<R>): Promise<R> {
		return this.activeView.read((view) => {
			if (!view) notInitialized("render");
			return fn(view);
		});
	}

	/**
	 * Hand `event` to the active view under a write lock held until its
	 * handler settles. Handler failures propagate.
	 */
	dispatchEventToCurrentView(
		event: AppEvent,
		context: ViewContext,
	): Promise<void> {
		return this.activeView.write(async (guard) => {
			const view = guard.value;
			if (!view) notInitialized("dispatch");
			if (view.handleEvent) {
				await view.handleEvent(event, context);
			}
		});
	}

	/**
	 * Queue `view` to replace the active view at the next iteration.
	 * Never touches the active-view lock, so it is safe from inside a handler.
	 * Resolves false when another view is already queued.
	 * @throws LifecycleError NOT_INITIALIZED before initialize()
	 */
	async requestViewChange(view: View): Promise<boolean> {
		await this.application.read((state) => {
			if (!state) notInitialized("changeView");
		});
		return this.pending.request(view);
	}

	/**
	 * Install the queued view, if any, and destroy the one it replaces.
	 * Only call this where nothing holds the active view (top of the loop).
	 */
	async applyPendingSwap(): Promise<AppliedSwap | null> {
		const next = await this.pending.take();
		if (!next) return null;

		const previous = await this.activeView.write((guard) => {
			const replaced = guard.value;
			guard.value = next;
			return replaced;
		});

		if (previous && previous !== next) {
			previous.destroy?.();
		}
		return { previous, next };
	}

	async snapshot(): Promise<StoreSnapshot> {
		const state = await this.application.read((value) => value);
		const hasView = await this.activeView.read((view) => view !== null);
		return {
			initialized: state !== null,
			isRunning: state?.isRunning ?? null,
			hasView,
			swapPending: await this.pending.isPending(),
		};
	}
}
