/**
 * Rectangular region of the terminal, in cells
 * Origin (0, 0) is the top-left corner
 */
export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}

/**
 * Cell style applied when a frame is flushed to the terminal
 * Colors are hex strings ("#rrggbb")
 */
export interface Style {
	fg?: string;
	bg?: string;
	bold?: boolean;
	inverse?: boolean;
}

/**
 * Keyboard event, normalised from the terminal library's key names
 */
export interface KeyEvent {
	type: "key";
	name: string;
	ctrl: boolean;
	shift: boolean;
	meta: boolean;
}

/**
 * Terminal resize event
 */
export interface ResizeEvent {
	type: "resize";
	width: number;
	height: number;
}

/**
 * Input event delivered to the active view
 */
export type AppEvent = KeyEvent | ResizeEvent;

/**
 * Color scheme definition
 */
export interface ColorScheme {
	bg: string;
	bgSecondary: string;
	border: string;
	textPrimary: string;
	textSecondary: string;
	textDim: string;
	accent: string;
	highlight: string;
	success: string;
	warning: string;
	error: string;
}
