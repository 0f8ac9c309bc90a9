/**
 * Application
 * Owns the shared store and drives the render / read-event / dispatch loop
 */

import { LifecycleError, tagRunPhase, type RunPhase } from "../errors";
import type { EventEmitter, LifecycleEventMap } from "../events";
import { getLifecycleEventBus } from "../events";
import type { EventSource } from "../events/EventSource";
import { ApplicationStore } from "../state";
import type { TerminalBackend, TerminalSurface } from "../terminal/TerminalBackend";
import { getLogger } from "../utils";
import { describeView, type View, type ViewContext } from "../view";

const logger = getLogger("Application");

export interface ApplicationOptions {
	store?: ApplicationStore;
	bus?: EventEmitter<LifecycleEventMap>;
}

/**
 * Collaborators the loop drives: where frames go and where events come from
 */
export interface RunIO {
	backend: TerminalBackend;
	events: EventSource;
}

/**
 * Application lifecycle core
 *
 * Order per iteration:
 *   1. install a queued view, if any
 *   2. draw the active view (read lock held only while it renders)
 *   3. wait for one input event
 *   4. dispatch it to the active view (write lock held until its handler settles)
 *   5. stop if the running flag was cleared
 * The terminal surface is released on every way out of the loop.
 */
export class Application {
	readonly store: ApplicationStore;
	/** Handed to every event handler */
	readonly context: ViewContext;
	private readonly bus: EventEmitter<LifecycleEventMap>;
	private looping = false;
	private iterations = 0;

	constructor(options: ApplicationOptions = {}) {
		this.store = options.store ?? new ApplicationStore();
		this.bus = options.bus ?? getLifecycleEventBus();
		this.context = {
			stop: () => this.stop(),
			changeView: (view) => this.changeView(view),
			isRunning: () => this.isRunning(),
		};
	}

	/**
	 * Establish the running state with `view` active.
	 * Later calls are ignored and keep the first view.
	 */
	async init(view: View): Promise<void> {
		const established = await this.store.initialize(view);
		if (!established) {
			logger.debug("init() ignored: application already initialized");
			return;
		}

		logger.debug(`Initialized with ${describeView(view)}`);
		await this.bus.emit("lifecycle:initialized", { view: describeView(view) });
	}

	isRunning(): Promise<boolean> {
		return this.store.readIsRunning();
	}

	/**
	 * Ask the loop to stop after the current iteration
	 */
	async stop(): Promise<void> {
		await this.store.requestStop();
		logger.debug("Stop requested");
	}

	/**
	 * Queue `view` to become active at the start of the next iteration.
	 * While another view is queued the request is dropped and resolves false.
	 */
	async changeView(view: View): Promise<boolean> {
		const accepted = await this.store.requestViewChange(view);
		const name = describeView(view);

		if (accepted) {
			logger.debug(`View change to ${name} queued`);
		} else {
			logger.debug(`View change to ${name} dropped: another change is pending`);
		}
		await this.bus.emit("view:changeRequested", { view: name, accepted });
		return accepted;
	}

	/**
	 * Completed or in-progress iterations of the current (or last) run
	 */
	get iterationCount(): number {
		return this.iterations;
	}

	/**
	 * Run the loop until the running flag is cleared.
	 * Rejects with the first failure from the terminal, the event source or a
	 * handler, after the terminal has been released.
	 * @throws LifecycleError NOT_INITIALIZED before init(), ALREADY_RUNNING when re-entered
	 */
	async run(io: RunIO): Promise<void> {
		if (this.looping) {
			throw new LifecycleError("ALREADY_RUNNING", "run: the loop is already running");
		}
		this.looping = true;
		this.iterations = 0;

		try {
			// Fails before the terminal is touched when init() was never called
			let running = await this.store.readIsRunning();

			const surface = await this.phase("acquire", () => io.backend.acquire());
			let failed = false;
			let failure: unknown;

			try {
				await this.bus.emit("lifecycle:started", undefined);
				while (running) {
					await this.iterate(surface, io.events);
					running = await this.store.readIsRunning();
				}
			} catch (error) {
				failed = true;
				failure = error;
			}

			try {
				await this.phase("release", () => io.backend.release(surface));
			} catch (releaseError) {
				if (failed) {
					logger.warn("Terminal release failed after loop failure:", releaseError);
				} else {
					failed = true;
					failure = releaseError;
				}
			}

			if (failed) {
				throw failure;
			}
		} catch (error) {
			logger.error(`Run loop failed after ${this.iterations} iteration(s):`, error);
			await this.bus.emit("lifecycle:failed", {
				error,
				iterations: this.iterations,
			});
			throw error;
		} finally {
			this.looping = false;
		}

		logger.info(`Run loop stopped after ${this.iterations} iteration(s)`);
		await this.bus.emit("lifecycle:stopped", { iterations: this.iterations });
	}

	private async iterate(surface: TerminalSurface, events: EventSource): Promise<void> {
		this.iterations++;

		const swap = await this.store.applyPendingSwap();
		if (swap) {
			const from = swap.previous ? describeView(swap.previous) : "none";
			const to = describeView(swap.next);
			logger.debug(`Swapped view ${from} -> ${to}`);
			await this.bus.emit("view:swapped", {
				from,
				to,
				iteration: this.iterations,
			});
		}

		await this.phase("draw", () =>
			surface.draw((frame) =>
				this.phase("render", () =>
					this.store.renderCurrentView((view) => view.render(frame.area, frame.buffer)),
				),
			),
		);

		const event = await this.phase("read", () => events.readNextEvent());
		await this.phase("dispatch", () =>
			this.store.dispatchEventToCurrentView(event, this.context),
		);
	}

	/**
	 * Run `work`, tagging anything it throws with the loop step it came from
	 */
	private async phase<T>(phase: RunPhase, work: () => Promise<T>): Promise<T> {
		try {
			return await work();
		} catch (error) {
			tagRunPhase(error, phase);
			throw error;
		}
	}
}
