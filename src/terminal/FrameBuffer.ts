/**
 * Frame Buffer
 * Grid of styled cells a view paints into before the frame is flushed
 */

import type { Rect, Style } from "../types";

export interface Cell {
	symbol: string;
	style: Style;
}

/**
 * Changed cell produced by {@link FrameBuffer.diff}
 */
export interface CellUpdate {
	x: number;
	y: number;
	cell: Cell;
}

const BLANK = " ";

function blankCell(): Cell {
	return { symbol: BLANK, style: {} };
}

export function sameStyle(a: Style, b: Style): boolean {
	return (
		a.fg === b.fg &&
		a.bg === b.bg &&
		(a.bold ?? false) === (b.bold ?? false) &&
		(a.inverse ?? false) === (b.inverse ?? false)
	);
}

/**
 * Intersection of two rectangles (empty rect when they do not overlap)
 */
export function intersect(a: Rect, b: Rect): Rect {
	const x = Math.max(a.x, b.x);
	const y = Math.max(a.y, b.y);
	const right = Math.min(a.x + a.width, b.x + b.width);
	const bottom = Math.min(a.y + a.height, b.y + b.height);
	return {
		x,
		y,
		width: Math.max(0, right - x),
		height: Math.max(0, bottom - y),
	};
}

export class FrameBuffer {
	readonly area: Rect;
	private cells: Cell[];

	constructor(width: number, height: number) {
		const w = Math.max(0, Math.floor(width));
		const h = Math.max(0, Math.floor(height));
		this.area = { x: 0, y: 0, width: w, height: h };
		this.cells = Array.from({ length: w * h }, blankCell);
	}

	get width(): number {
		return this.area.width;
	}

	get height(): number {
		return this.area.height;
	}

	/**
	 * Cell at (x, y), or undefined outside the buffer
	 */
	cell(x: number, y: number): Cell | undefined {
		if (!this.contains(x, y)) return undefined;
		return this.cells[y * this.width + x];
	}

	/**
	 * Write `text` starting at (x, y), one code point per cell.
	 * Anything outside `clip` (default: the whole buffer) is dropped.
	 * Returns the number of cells written.
	 */
	setString(
		x: number,
		y: number,
		text: string,
		style: Style = {},
		clip: Rect = this.area,
	): number {
		const bounds = intersect(clip, this.area);
		if (y < bounds.y || y >= bounds.y + bounds.height) return 0;

		let written = 0;
		let column = x;
		for (const symbol of text) {
			if (column >= bounds.x + bounds.width) break;
			if (column >= bounds.x) {
				this.cells[y * this.width + column] = { symbol, style: { ...style } };
				written++;
			}
			column++;
		}
		return written;
	}

	/**
	 * Fill a region with one symbol and style
	 */
	fill(region: Rect, symbol: string = BLANK, style: Style = {}): void {
		const bounds = intersect(region, this.area);
		for (let row = bounds.y; row < bounds.y + bounds.height; row++) {
			for (let col = bounds.x; col < bounds.x + bounds.width; col++) {
				this.cells[row * this.width + col] = { symbol, style: { ...style } };
			}
		}
	}

	/**
	 * Reset every cell to a blank, unstyled space
	 */
	reset(): void {
		this.cells = Array.from({ length: this.width * this.height }, blankCell);
	}

	/**
	 * Symbols of row `y` as a string (trailing blanks kept)
	 */
	line(y: number): string {
		if (y < 0 || y >= this.height) return "";
		const start = y * this.width;
		return this.cells
			.slice(start, start + this.width)
			.map((cell) => cell.symbol)
			.join("");
	}

	/**
	 * Cells that differ from `previous`.
	 * Every cell is reported when the sizes differ.
	 */
	diff(previous: FrameBuffer | null): CellUpdate[] {
		const updates: CellUpdate[] = [];
		const base =
			previous !== null &&
			previous.width === this.width &&
			previous.height === this.height
				? previous
				: null;

		for (let y = 0; y < this.height; y++) {
			for (let x = 0; x < this.width; x++) {
				const cell = this.cells[y * this.width + x];
				const before = base?.cell(x, y);
				if (
					before === undefined ||
					before.symbol !== cell.symbol ||
					!sameStyle(before.style, cell.style)
				) {
					updates.push({ x, y, cell });
				}
			}
		}
		return updates;
	}

	private contains(x: number, y: number): boolean {
		return x >= 0 && y >= 0 && x < this.width && y < this.height;
	}
}
