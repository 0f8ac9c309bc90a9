/**
 * Pending View Swap
 * Single-slot mailbox for the next active view
 *
 * A view's handler runs while the active-view cell is write-locked, so it can
 * never replace the active view directly. It drops the replacement here and
 * the run loop installs it at the top of the next iteration, when nothing
 * holds the active view.
 */

import type { View } from "../view";
import { RwLock } from "./RwLock";

export type SwapSlot =
	| { state: "stable" }
	| { state: "swapRequested"; next: View };

export class PendingViewSwap {
	private readonly slot = new RwLock<SwapSlot>({ state: "stable" }, "PendingViewSwap");

	/**
	 * Queue `view`. Returns false, leaving the slot untouched, if a view is
	 * already queued: the first request wins.
	 */
	request(view: View): Promise<boolean> {
		return this.slot.write((guard) => {
			if (guard.value.state === "swapRequested") {
				return false;
			}
			guard.value = { state: "swapRequested", next: view };
			return true;
		});
	}

	/**
	 * Move the queued view out, returning the slot to stable
	 */
	take(): Promise<View | null> {
		return this.slot.write((guard) => {
			const current = guard.value;
			if (current.state === "stable") {
				return null;
			}
			guard.value = { state: "stable" };
			return current.next;
		});
	}

	/**
	 * Whether a view is waiting to be installed
	 */
	isPending(): Promise<boolean> {
		return this.slot.read((slot) => slot.state === "swapRequested");
	}
}
