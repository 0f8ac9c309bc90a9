/**
 * In-process stand-ins for the terminal and input used by the tests
 */

import type { EventSource } from "../events";
import { FrameBuffer } from "../terminal/FrameBuffer";
import type { Frame, TerminalBackend, TerminalSurface } from "../terminal/TerminalBackend";
import type { KeyListener, ResizeListener, TerminalLike, Unsubscribe } from "../terminal/termkit";
import type { AppEvent, KeyEvent, Rect } from "../types";
import type { View, ViewContext } from "../view";

/**
 * Resolves once already-queued callbacks and promise continuations have run
 */
export function tick(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

export interface Deferred {
	promise: Promise<void>;
	resolve: () => void;
}

export function deferred(): Deferred {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

/**
 * ViewContext that records what handlers ask for
 */
export class RecordingContext implements ViewContext {
	stops = 0;
	readonly changes: View[] = [];
	running = true;

	async stop(): Promise<void> {
		this.stops++;
		this.running = false;
	}

	async changeView(view: View): Promise<boolean> {
		this.changes.push(view);
		return true;
	}

	async isRunning(): Promise<boolean> {
		return this.running;
	}
}

export function key(name: string, modifiers: Partial<Omit<KeyEvent, "type" | "name">> = {}): KeyEvent {
	return {
		type: "key",
		name,
		ctrl: modifiers.ctrl ?? false,
		shift: modifiers.shift ?? false,
		meta: modifiers.meta ?? false,
	};
}

/**
 * Surface that renders into a fresh buffer per frame and keeps every frame
 */
export class RecordingSurface implements TerminalSurface {
	readonly frames: FrameBuffer[] = [];

	constructor(
		private readonly width = 20,
		private readonly height = 4,
		private readonly failure: Error | null = null,
	) {}

	async draw(render: (frame: Frame) => void | Promise<void>): Promise<void> {
		if (this.failure) throw this.failure;
		const buffer = new FrameBuffer(this.width, this.height);
		await render({ area: buffer.area, buffer });
		this.frames.push(buffer);
	}
}

export interface FakeBackendOptions {
	width?: number;
	height?: number;
	acquireError?: Error;
	releaseError?: Error;
	drawError?: Error;
}

export class FakeBackend implements TerminalBackend {
	readonly surface: RecordingSurface;
	acquired = 0;
	released = 0;

	constructor(private readonly options: FakeBackendOptions = {}) {
		this.surface = new RecordingSurface(
			options.width ?? 20,
			options.height ?? 4,
			options.drawError ?? null,
		);
	}

	async acquire(): Promise<TerminalSurface> {
		if (this.options.acquireError) throw this.options.acquireError;
		this.acquired++;
		return this.surface;
	}

	async release(): Promise<void> {
		this.released++;
		if (this.options.releaseError) throw this.options.releaseError;
	}
}

/**
 * Delivers the given events in order, then rejects every read
 */
export class ScriptedEvents implements EventSource {
	private readonly events: AppEvent[];
	reads = 0;

	constructor(events: AppEvent[]) {
		this.events = [...events];
	}

	async readNextEvent(): Promise<AppEvent> {
		this.reads++;
		const next = this.events.shift();
		if (!next) throw new Error("event script exhausted");
		return next;
	}
}

/**
 * View that paints its name on row 0 and records what happens to it
 */
export class RecordingView implements View {
	renders = 0;
	destroyed = 0;
	readonly events: AppEvent[] = [];
	onEvent: ((event: AppEvent, context: ViewContext) => void | Promise<void>) | null = null;

	constructor(readonly name: string) {}

	render(area: Rect, buffer: FrameBuffer): void {
		this.renders++;
		buffer.setString(area.x, area.y, this.name);
	}

	async handleEvent(event: AppEvent, context: ViewContext): Promise<void> {
		this.events.push(event);
		await this.onEvent?.(event, context);
	}

	destroy(): void {
		this.destroyed++;
	}
}

/**
 * TerminalLike that records every call as a string
 */
export class FakeTerminal implements TerminalLike {
	readonly calls: string[] = [];
	private keyListeners: KeyListener[] = [];
	private resizeListeners: ResizeListener[] = [];

	constructor(
		public width: number,
		public height: number,
	) {}

	write(text: string): void {
		this.calls.push(`write:${text}`);
	}
	moveTo(x: number, y: number): void {
		this.calls.push(`moveTo:${x},${y}`);
	}
	clear(): void {
		this.calls.push("clear");
	}
	styleReset(): void {
		this.calls.push("styleReset");
	}
	bold(): void {
		this.calls.push("bold");
	}
	inverse(): void {
		this.calls.push("inverse");
	}
	colorRgb(r: number, g: number, b: number): void {
		this.calls.push(`colorRgb:${r},${g},${b}`);
	}
	bgColorRgb(r: number, g: number, b: number): void {
		this.calls.push(`bgColorRgb:${r},${g},${b}`);
	}
	hideCursor(hidden = true): void {
		this.calls.push(`hideCursor:${hidden}`);
	}
	fullscreen(enable: boolean): void {
		this.calls.push(`fullscreen:${enable}`);
	}
	grabInput(enable: boolean): void {
		this.calls.push(`grabInput:${enable}`);
	}

	onKey(listener: KeyListener): Unsubscribe {
		this.keyListeners.push(listener);
		return () => {
			this.keyListeners = this.keyListeners.filter((l) => l !== listener);
		};
	}

	onResize(listener: ResizeListener): Unsubscribe {
		this.resizeListeners.push(listener);
		return () => {
			this.resizeListeners = this.resizeListeners.filter((l) => l !== listener);
		};
	}

	pressKey(name: string): void {
		for (const listener of this.keyListeners) listener(name);
	}

	resize(width: number, height: number): void {
		this.width = width;
		this.height = height;
		for (const listener of this.resizeListeners) listener(width, height);
	}

	get listenerCount(): number {
		return this.keyListeners.length + this.resizeListeners.length;
	}
}
