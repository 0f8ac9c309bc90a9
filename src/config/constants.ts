/**
 * Application name, used for config and log directories
 */
export const APP_NAME = "viewloop";

/**
 * Smallest frame drawn when the terminal does not report its size
 */
export const MIN_TERM_WIDTH = 40;
export const MIN_TERM_HEIGHT = 12;

/**
 * Input events buffered before the oldest is dropped
 */
export const DEFAULT_MAX_QUEUED_EVENTS = 256;

/**
 * Time allowed for flushing logs when the process is torn down
 */
export const SHUTDOWN_FLUSH_TIMEOUT_MS = 500;

/**
 * Key bindings used by the demo views
 */
export const KEY_BINDINGS = {
	quit: ["q"],
	up: ["up", "k"],
	down: ["down", "j"],
	select: ["return"],
	back: ["escape", "backspace"],
	reset: ["r"],
} as const;

/**
 * UI strings
 */
export const UI_STRINGS = {
	welcomeTitle: APP_NAME,
	welcomeHint: "j/k: move  enter: open  q: quit",
	counterTitle: "COUNTER",
	counterHint: "j/k: change  r: reset  esc: back  q: quit",
} as const;
