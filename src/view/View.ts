import type { FrameBuffer } from "../terminal/FrameBuffer";
import type { AppEvent, Rect } from "../types";

/**
 * Runtime context handed to a view's event handler
 *
 * This is how a view reaches the state that controls its own lifecycle:
 * stopping the application or queueing the next view.
 */
export interface ViewContext {
	/**
	 * Request that the run loop stops after the current iteration
	 */
	stop(): Promise<void>;

	/**
	 * Queue `view` to become active at the start of the next iteration.
	 * Resolves false if another change is already pending (the first request wins).
	 */
	changeView(view: View): Promise<boolean>;

	/**
	 * Read the running flag
	 */
	isRunning(): Promise<boolean>;
}

/**
 * A screen of the application
 *
 * The run loop holds exactly one view at a time and only ever talks to it
 * through this interface.
 */
export interface View {
	/**
	 * Name used in logs; defaults to the class name
	 */
	readonly name?: string;

	/**
	 * Paint the view into `area` of `buffer`.
	 * Must depend only on the view's own state and the area size, with no I/O.
	 */
	render(area: Rect, buffer: FrameBuffer): void;

	/**
	 * React to one input event. Omitted means the event is ignored.
	 * A throw or rejection ends the run loop.
	 */
	handleEvent?(event: AppEvent, context: ViewContext): void | Promise<void>;

	/**
	 * Called once after the view has been replaced by a view change
	 */
	destroy?(): void;
}

/**
 * Human-readable name of a view for logs and lifecycle events
 */
export function describeView(view: View): string {
	if (typeof view.name === "string" && view.name.length > 0) {
		return view.name;
	}
	const ctorName = view.constructor.name;
	return ctorName && ctorName !== "Object" ? ctorName : "anonymous view";
}
