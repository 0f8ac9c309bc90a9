import { KEY_BINDINGS, UI_STRINGS } from "../config";
import type { FrameBuffer } from "../terminal/FrameBuffer";
import type { AppEvent, ColorScheme, Rect } from "../types";
import { color, drawBox, drawText, inner, isInterrupt, matchesKey } from "../ui/draw";
import type { View, ViewContext } from "../view";
import { CounterView } from "./CounterView";

interface MenuItem {
	id: "counter" | "quit";
	label: string;
}

const MENU_ITEMS: readonly MenuItem[] = [
	{ id: "counter", label: "Counter" },
	{ id: "quit", label: "Quit" },
];

/**
 * Welcome menu, the first view of the demo
 */
export class WelcomeView implements View {
	readonly name = "welcome";
	private selected = 0;

	constructor(private scheme: ColorScheme) {}

	get selectedIndex(): number {
		return this.selected;
	}

	render(area: Rect, buffer: FrameBuffer): void {
		drawBox(buffer, area, this.scheme, UI_STRINGS.welcomeTitle);
		const body = inner(area);

		MENU_ITEMS.forEach((item, index) => {
			const isSelected = index === this.selected;
			drawText(buffer, body, index + 1, `${isSelected ? " > " : "   "}${item.label}`, {
				fg: color(isSelected ? this.scheme.textPrimary : this.scheme.textSecondary),
				bold: isSelected,
				inverse: isSelected,
			});
		});
		drawText(buffer, body, body.height - 1, ` ${UI_STRINGS.welcomeHint}`, {
			fg: color(this.scheme.textDim),
		});
	}

	async handleEvent(event: AppEvent, context: ViewContext): Promise<void> {
		if (event.type !== "key") return;

		if (isInterrupt(event) || matchesKey(event, KEY_BINDINGS.quit)) {
			await context.stop();
		} else if (matchesKey(event, KEY_BINDINGS.up)) {
			this.selected = Math.max(0, this.selected - 1);
		} else if (matchesKey(event, KEY_BINDINGS.down)) {
			this.selected = Math.min(MENU_ITEMS.length - 1, this.selected + 1);
		} else if (matchesKey(event, KEY_BINDINGS.select)) {
			await this.open(MENU_ITEMS[this.selected], context);
		}
	}

	private async open(item: MenuItem, context: ViewContext): Promise<void> {
		switch (item.id) {
			case "counter":
				await context.changeView(
					new CounterView(this.scheme, () => new WelcomeView(this.scheme)),
				);
				break;
			case "quit":
				await context.stop();
				break;
		}
	}
}
