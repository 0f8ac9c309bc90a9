/**
 * terminal-kit Terminal Backend
 * Fullscreen surface that flushes only the cells that changed since the last frame
 */

import { MIN_TERM_HEIGHT, MIN_TERM_WIDTH } from "../config/constants";
import type { Style } from "../types";
import { getLogger } from "../utils";
import { FrameBuffer, sameStyle, type CellUpdate } from "./FrameBuffer";
import type { Frame, TerminalBackend, TerminalSurface } from "./TerminalBackend";
import {
	getDefaultTerminal,
	hexToRgb,
	sanitizeTermSize,
	type TerminalLike,
} from "./termkit";

const logger = getLogger("TerminalKitBackend");

export interface TerminalKitBackendOptions {
	/** Draw on the alternate screen and restore the previous contents on release */
	alternateScreen: boolean;
}

const DEFAULT_OPTIONS: TerminalKitBackendOptions = {
	alternateScreen: true,
};

/**
 * Run of adjacent cells on one row sharing a style
 */
interface Span {
	x: number;
	y: number;
	text: string;
	/** Cells covered by `text` */
	width: number;
	style: Style;
}

function toSpans(updates: CellUpdate[]): Span[] {
	const spans: Span[] = [];
	let current: Span | null = null;

	for (const { x, y, cell } of updates) {
		if (
			current &&
			current.y === y &&
			current.x + current.width === x &&
			sameStyle(current.style, cell.style)
		) {
			current.text += cell.symbol;
			current.width++;
			continue;
		}
		current = { x, y, text: cell.symbol, width: 1, style: cell.style };
		spans.push(current);
	}
	return spans;
}

class TerminalKitSurface implements TerminalSurface {
	private previous: FrameBuffer | null = null;

	constructor(private readonly term: TerminalLike) {}

	async draw(render: (frame: Frame) => void | Promise<void>): Promise<void> {
		const width = sanitizeTermSize(this.term.width, MIN_TERM_WIDTH);
		const height = sanitizeTermSize(this.term.height, MIN_TERM_HEIGHT);
		const buffer = new FrameBuffer(width, height);

		await render({ area: buffer.area, buffer });

		const resized =
			this.previous !== null &&
			(this.previous.width !== buffer.width || this.previous.height !== buffer.height);
		if (resized) {
			// Stale cells outside the new area would otherwise stay on screen
			this.term.clear();
		}
		const updates = buffer.diff(this.previous);
		for (const span of toSpans(updates)) {
			this.writeSpan(span);
		}
		this.term.styleReset();
		this.previous = buffer;
	}

	private writeSpan(span: Span): void {
		this.term.styleReset();
		// terminal-kit coordinates are 1-based
		this.term.moveTo(span.x + 1, span.y + 1);

		const fg = span.style.fg ? hexToRgb(span.style.fg) : null;
		const bg = span.style.bg ? hexToRgb(span.style.bg) : null;
		if (fg) this.term.colorRgb(fg[0], fg[1], fg[2]);
		if (bg) this.term.bgColorRgb(bg[0], bg[1], bg[2]);
		if (span.style.bold) this.term.bold();
		if (span.style.inverse) this.term.inverse();

		this.term.write(span.text);
	}
}

/**
 * Terminal backend on terminal-kit
 */
export class TerminalKitBackend implements TerminalBackend {
	private active: TerminalKitSurface | null = null;
	private readonly options: TerminalKitBackendOptions;

	constructor(
		private readonly term: TerminalLike = getDefaultTerminal(),
		options: Partial<TerminalKitBackendOptions> = {},
	) {
		this.options = { ...DEFAULT_OPTIONS, ...options };
	}

	async acquire(): Promise<TerminalSurface> {
		if (this.options.alternateScreen) {
			this.term.fullscreen(true);
		}
		this.term.hideCursor();
		this.term.grabInput(true);
		this.term.clear();

		const surface = new TerminalKitSurface(this.term);
		this.active = surface;
		logger.debug("Terminal acquired");
		return surface;
	}

	async release(surface: TerminalSurface): Promise<void> {
		if (surface !== this.active) {
			logger.warn("Ignoring release of a surface that is not active");
			return;
		}
		this.active = null;

		this.term.grabInput(false);
		this.term.styleReset();
		this.term.hideCursor(false);
		if (this.options.alternateScreen) {
			this.term.fullscreen(false);
		} else {
			this.term.clear();
		}
		logger.debug("Terminal released");
	}
}
