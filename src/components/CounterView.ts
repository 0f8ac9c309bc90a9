import { KEY_BINDINGS, UI_STRINGS } from "../config";
import type { FrameBuffer } from "../terminal/FrameBuffer";
import type { AppEvent, ColorScheme, Rect } from "../types";
import { color, drawBox, drawText, inner, isInterrupt, matchesKey } from "../ui/draw";
import { getLogger } from "../utils";
import type { View, ViewContext } from "../view";

const logger = getLogger("CounterView");

/**
 * Counter view
 * up/down change the count, r resets it, escape goes back
 */
export class CounterView implements View {
	readonly name = "counter";
	private count = 0;

	constructor(
		private scheme: ColorScheme,
		private back: () => View,
	) {}

	get value(): number {
		return this.count;
	}

	render(area: Rect, buffer: FrameBuffer): void {
		drawBox(buffer, area, this.scheme, UI_STRINGS.counterTitle);
		const body = inner(area);

		drawText(buffer, body, 1, ` Count: ${this.count}`, {
			fg: color(this.scheme.textPrimary),
			bold: true,
		});
		drawText(buffer, body, body.height - 1, ` ${UI_STRINGS.counterHint}`, {
			fg: color(this.scheme.textDim),
		});
	}

	async handleEvent(event: AppEvent, context: ViewContext): Promise<void> {
		if (event.type !== "key") return;

		if (isInterrupt(event) || matchesKey(event, KEY_BINDINGS.quit)) {
			await context.stop();
		} else if (matchesKey(event, KEY_BINDINGS.up)) {
			this.count++;
		} else if (matchesKey(event, KEY_BINDINGS.down)) {
			this.count--;
		} else if (matchesKey(event, KEY_BINDINGS.reset)) {
			this.count = 0;
		} else if (matchesKey(event, KEY_BINDINGS.back)) {
			await context.changeView(this.back());
		}
	}

	destroy(): void {
		logger.debug(`Counter closed at ${this.count}`);
	}
}
