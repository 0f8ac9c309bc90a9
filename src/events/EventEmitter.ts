/**
 * Type-Safe Event Emitter
 * Publish-subscribe for lifecycle notifications
 */

import { getLogger } from "../utils";

const logger = getLogger("EventEmitter");

/**
 * Event listener function type
 */
export type EventListener<T> = (data: T) => void | Promise<void>;

/**
 * Event subscription handle for cleanup
 */
export interface EventSubscription {
	unsubscribe(): void;
}

type ListenerTable<EventMap> = {
	[K in keyof EventMap]?: Set<EventListener<EventMap[K]>>;
};

/**
 * Type-safe event emitter
 * A failing listener is logged and never stops the others
 */
export class EventEmitter<EventMap extends object> {
	private listeners: ListenerTable<EventMap> = {};
	private onceListeners: ListenerTable<EventMap> = {};

	/**
	 * Subscribe to an event
	 */
	on<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const set = this.listeners[event] ?? new Set<EventListener<EventMap[K]>>();
		set.add(listener);
		this.listeners[event] = set;

		return {
			unsubscribe: () => this.off(event, listener),
		};
	}

	/**
	 * Subscribe to an event once (auto-unsubscribe after first emission)
	 */
	once<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const set =
			this.onceListeners[event] ?? new Set<EventListener<EventMap[K]>>();
		set.add(listener);
		this.onceListeners[event] = set;

		return {
			unsubscribe: () => this.off(event, listener),
		};
	}

	/**
	 * Unsubscribe from an event
	 */
	off<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): void {
		this.listeners[event]?.delete(listener);
		this.onceListeners[event]?.delete(listener);
	}

	/**
	 * Emit an event to all subscribers, one after another
	 */
	async emit<K extends keyof EventMap>(
		event: K,
		data: EventMap[K],
	): Promise<void> {
		const eventName = String(event);

		for (const listener of this.listeners[event] ?? []) {
			try {
				await listener(data);
			} catch (error) {
				logger.error(`Error in event listener for '${eventName}':`, error);
			}
		}

		const onceListeners = this.onceListeners[event];
		if (onceListeners) {
			this.onceListeners[event] = undefined;
			for (const listener of onceListeners) {
				try {
					await listener(data);
				} catch (error) {
					logger.error(`Error in once listener for '${eventName}':`, error);
				}
			}
		}
	}

	/**
	 * Remove all listeners for an event, or for every event
	 */
	removeAllListeners<K extends keyof EventMap>(event?: K): void {
		if (event !== undefined) {
			this.listeners[event] = undefined;
			this.onceListeners[event] = undefined;
		} else {
			this.listeners = {};
			this.onceListeners = {};
		}
	}

	/**
	 * Get number of listeners for an event
	 */
	listenerCount<K extends keyof EventMap>(event: K): number {
		const regular = this.listeners[event]?.size ?? 0;
		const once = this.onceListeners[event]?.size ?? 0;
		return regular + once;
	}
}

/**
 * Create a typed event emitter
 */
export function createEventEmitter<
	EventMap extends object,
>(): EventEmitter<EventMap> {
	return new EventEmitter<EventMap>();
}
