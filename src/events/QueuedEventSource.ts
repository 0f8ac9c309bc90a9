/**
 * Queued Event Source
 * Buffers pushed input events until the run loop asks for the next one
 */

import { DEFAULT_MAX_QUEUED_EVENTS } from "../config/constants";
import type { AppEvent } from "../types";
import { getLogger } from "../utils";
import type { EventSource } from "./EventSource";

const logger = getLogger("QueuedEventSource");

interface PendingRead {
	resolve: (event: AppEvent) => void;
	reject: (error: Error) => void;
}

/**
 * Event source fed by push().
 * When the buffer is full the oldest event is dropped.
 * After fail() queued events are still delivered, then every read rejects.
 */
export class QueuedEventSource implements EventSource {
	private queue: AppEvent[] = [];
	private readers: PendingRead[] = [];
	private failure: Error | null = null;
	private dropped = 0;

	constructor(private readonly capacity: number = DEFAULT_MAX_QUEUED_EVENTS) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Event queue capacity must be a positive integer, got ${capacity}`);
		}
	}

	/**
	 * Deliver an event to a waiting reader, or buffer it
	 */
	push(event: AppEvent): void {
		if (this.failure) return;

		const reader = this.readers.shift();
		if (reader) {
			reader.resolve(event);
			return;
		}

		if (this.queue.length >= this.capacity) {
			this.queue.shift();
			this.dropped++;
			logger.warn(`Event queue full (${this.capacity}), dropped oldest event`);
		}
		this.queue.push(event);
	}

	/**
	 * Mark the source as failed; waiting and future reads reject with `error`
	 */
	fail(error: Error): void {
		if (this.failure) return;
		this.failure = error;

		for (const reader of this.readers.splice(0)) {
			reader.reject(error);
		}
	}

	readNextEvent(): Promise<AppEvent> {
		const next = this.queue.shift();
		if (next !== undefined) {
			return Promise.resolve(next);
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		return new Promise<AppEvent>((resolve, reject) => {
			this.readers.push({ resolve, reject });
		});
	}

	/**
	 * Number of buffered events
	 */
	get size(): number {
		return this.queue.length;
	}

	/**
	 * Number of events dropped because the buffer was full
	 */
	get droppedCount(): number {
		return this.dropped;
	}
}
