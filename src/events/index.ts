export {
	EventEmitter,
	createEventEmitter,
	type EventListener,
	type EventSubscription,
} from "./EventEmitter";

export {
	getLifecycleEventBus,
	type LifecycleEventMap,
	type ViewSwapped,
} from "./LifecycleEvents";

export type { EventSource } from "./EventSource";
export { QueuedEventSource } from "./QueuedEventSource";
