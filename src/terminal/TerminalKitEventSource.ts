/**
 * terminal-kit Event Source
 * Turns terminal-kit "key" and "resize" events into AppEvents
 */

import { DEFAULT_MAX_QUEUED_EVENTS } from "../config/constants";
import type { EventSource } from "../events/EventSource";
import { QueuedEventSource } from "../events/QueuedEventSource";
import type { AppEvent } from "../types";
import { toKeyEvent } from "./keys";
import { getDefaultTerminal, type TerminalLike, type Unsubscribe } from "./termkit";

export class TerminalKitEventSource implements EventSource {
	private readonly queue: QueuedEventSource;
	private readonly detach: Unsubscribe[];

	constructor(
		term: TerminalLike = getDefaultTerminal(),
		capacity: number = DEFAULT_MAX_QUEUED_EVENTS,
	) {
		this.queue = new QueuedEventSource(capacity);
		this.detach = [
			term.onKey((name) => this.queue.push(toKeyEvent(name))),
			term.onResize((width, height) =>
				this.queue.push({ type: "resize", width, height }),
			),
		];
	}

	readNextEvent(): Promise<AppEvent> {
		return this.queue.readNextEvent();
	}

	/**
	 * Detach from the terminal. Pending and later reads reject.
	 */
	close(): void {
		if (this.detach.length === 0) return;
		for (const unsubscribe of this.detach.splice(0)) {
			unsubscribe();
		}
		this.queue.fail(new Error("Terminal event source closed"));
	}
}
