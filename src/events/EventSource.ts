import type { AppEvent } from "../types";

/**
 * Input event collaborator
 * `readNextEvent` waits for exactly one event; a rejection is an I/O failure.
 */
export interface EventSource {
	readNextEvent(): Promise<AppEvent>;
}
