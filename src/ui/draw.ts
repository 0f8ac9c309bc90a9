/**
 * Drawing helpers
 * Borders, titled panels, and text rows painted into a FrameBuffer
 */

import type { FrameBuffer } from "../terminal/FrameBuffer";
import type { ColorScheme, KeyEvent, Rect, Style } from "../types";

const BORDER = {
	topLeft: "┌",
	topRight: "┐",
	bottomLeft: "└",
	bottomRight: "┘",
	horizontal: "─",
	vertical: "│",
} as const;

/**
 * Hex color, or undefined for the terminal default (empty scheme entries)
 */
export function color(value: string): string | undefined {
	return value === "" ? undefined : value;
}

/**
 * Area inside a one-cell border
 */
export function inner(area: Rect): Rect {
	return {
		x: area.x + 1,
		y: area.y + 1,
		width: Math.max(0, area.width - 2),
		height: Math.max(0, area.height - 2),
	};
}

/**
 * Single-line border around `area` with an optional title in the top edge
 */
export function drawBox(
	buffer: FrameBuffer,
	area: Rect,
	scheme: ColorScheme,
	title?: string,
): void {
	if (area.width < 2 || area.height < 2) return;

	const style: Style = { fg: color(scheme.border), bg: color(scheme.bg) };
	const right = area.x + area.width - 1;
	const bottom = area.y + area.height - 1;
	const edge = BORDER.horizontal.repeat(area.width - 2);

	buffer.fill(area, " ", { bg: color(scheme.bg) });
	buffer.setString(area.x, area.y, `${BORDER.topLeft}${edge}${BORDER.topRight}`, style);
	buffer.setString(
		area.x,
		bottom,
		`${BORDER.bottomLeft}${edge}${BORDER.bottomRight}`,
		style,
	);
	for (let y = area.y + 1; y < bottom; y++) {
		buffer.setString(area.x, y, BORDER.vertical, style);
		buffer.setString(right, y, BORDER.vertical, style);
	}

	if (title) {
		buffer.setString(
			area.x + 2,
			area.y,
			` ${title} `,
			{ fg: color(scheme.textPrimary), bg: color(scheme.bg), bold: true },
			{ x: area.x + 1, y: area.y, width: area.width - 2, height: 1 },
		);
	}
}

/**
 * Text at row `row` of `area`, clipped to it
 */
export function drawText(
	buffer: FrameBuffer,
	area: Rect,
	row: number,
	text: string,
	style: Style = {},
): number {
	if (row < 0 || row >= area.height) return 0;
	return buffer.setString(area.x, area.y + row, text, style, area);
}

/**
 * Whether a key event matches one of the binding's key names
 * Bindings never match with ctrl or meta held.
 */
export function matchesKey(event: KeyEvent, names: readonly string[]): boolean {
	if (event.ctrl || event.meta) return false;
	return names.includes(event.name);
}

/**
 * Ctrl+C, which arrives as a key while the terminal is in raw mode
 */
export function isInterrupt(event: KeyEvent): boolean {
	return event.ctrl && event.name === "c";
}
