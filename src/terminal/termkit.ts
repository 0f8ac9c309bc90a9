/**
 * The slice of terminal-kit's Terminal that the backend and event source use,
 * kept narrow so tests can stand in for the real terminal
 */

import { terminal } from "terminal-kit";

export type KeyListener = (name: string) => void;
export type ResizeListener = (width: number, height: number) => void;

/**
 * Detaches a listener
 */
export type Unsubscribe = () => void;

export interface TerminalLike {
	readonly width: number;
	readonly height: number;
	/** Write text at the cursor, without markup interpretation */
	write(text: string): void;
	moveTo(x: number, y: number): void;
	clear(): void;
	styleReset(): void;
	bold(): void;
	inverse(): void;
	colorRgb(r: number, g: number, b: number): void;
	bgColorRgb(r: number, g: number, b: number): void;
	hideCursor(hidden?: boolean): void;
	fullscreen(enable: boolean): void;
	grabInput(enable: boolean): void;
	onKey(listener: KeyListener): Unsubscribe;
	onResize(listener: ResizeListener): Unsubscribe;
}

/**
 * terminal-kit's process terminal (stdin/stdout)
 */
export function getDefaultTerminal(): TerminalLike {
	const term = terminal;

	return {
		get width() {
			return term.width;
		},
		get height() {
			return term.height;
		},
		// Passed as an argument so markup characters in view text stay literal
		write: (text) => {
			term("%s", text);
		},
		moveTo: (x, y) => {
			term.moveTo(x, y);
		},
		clear: () => {
			term.clear();
		},
		styleReset: () => {
			term.styleReset();
		},
		bold: () => {
			term.bold();
		},
		inverse: () => {
			term.inverse();
		},
		colorRgb: (r, g, b) => {
			term.colorRgb(r, g, b);
		},
		bgColorRgb: (r, g, b) => {
			term.bgColorRgb(r, g, b);
		},
		hideCursor: (hidden = true) => {
			term.hideCursor(hidden);
		},
		fullscreen: (enable) => {
			term.fullscreen(enable);
		},
		grabInput: (enable) => {
			term.grabInput(enable);
		},
		onKey: (listener) => {
			term.on("key", listener);
			return () => {
				term.removeListener("key", listener);
			};
		},
		onResize: (listener) => {
			term.on("resize", listener);
			return () => {
				term.removeListener("resize", listener);
			};
		},
	};
}

/**
 * Parse "#rrggbb" (or "#rgb") into RGB components
 */
export function hexToRgb(hex: string): [number, number, number] | null {
	const match = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
	if (!match) return null;

	let digits = match[1];
	if (digits.length === 3) {
		digits = [...digits].map((d) => d + d).join("");
	}
	const value = Number.parseInt(digits, 16);
	return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

/**
 * Clamp a reported terminal dimension to a usable value
 */
export function sanitizeTermSize(value: number | undefined, fallback: number): number {
	if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
		return fallback;
	}
	return Math.floor(value);
}
