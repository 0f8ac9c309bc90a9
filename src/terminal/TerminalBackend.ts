/**
 * Terminal surface collaborator
 * The run loop acquires one surface, draws a frame per iteration and
 * releases it on every exit path.
 */

import type { Rect } from "../types";
import type { FrameBuffer } from "./FrameBuffer";

/**
 * One frame being drawn: the full drawable area and the buffer to paint
 */
export interface Frame {
	readonly area: Rect;
	readonly buffer: FrameBuffer;
}

/**
 * An acquired terminal drawing target
 */
export interface TerminalSurface {
	/**
	 * Build a fresh frame, let `render` paint it, then flush it to the terminal.
	 * A rejected `render` aborts the frame without flushing.
	 */
	draw(render: (frame: Frame) => void | Promise<void>): Promise<void>;
}

/**
 * Acquires and restores the terminal
 */
export interface TerminalBackend {
	/**
	 * Switch the terminal into application mode and return its surface
	 */
	acquire(): Promise<TerminalSurface>;

	/**
	 * Restore the terminal mode that was active before `acquire`
	 */
	release(surface: TerminalSurface): Promise<void>;
}
