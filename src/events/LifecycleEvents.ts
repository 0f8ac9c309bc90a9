/**
 * Lifecycle Event Bus
 * Notifications about initialization, view changes and loop termination
 */

import type { EventEmitter } from "./EventEmitter";
import { createEventEmitter } from "./EventEmitter";

/**
 * View replaced at the top of an iteration
 */
export interface ViewSwapped {
	from: string;
	to: string;
	iteration: number;
}

/**
 * Lifecycle event map
 * Maps event names to their payload types
 */
export interface LifecycleEventMap {
	"lifecycle:initialized": { view: string };
	"lifecycle:started": void;
	"lifecycle:stopped": { iterations: number };
	"lifecycle:failed": { error: unknown; iterations: number };
	"view:changeRequested": { view: string; accepted: boolean };
	"view:swapped": ViewSwapped;
}

/**
 * Global lifecycle event bus
 */
let lifecycleBus: EventEmitter<LifecycleEventMap> | null = null;

/**
 * Get or create the global lifecycle event bus
 */
export function getLifecycleEventBus(): EventEmitter<LifecycleEventMap> {
	if (!lifecycleBus) {
		lifecycleBus = createEventEmitter<LifecycleEventMap>();
	}
	return lifecycleBus;
}
