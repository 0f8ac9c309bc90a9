import type { KeyEvent } from "../types";

/**
 * terminal-kit key names that map to a different normalised name
 */
const KEY_ALIASES: Record<string, string> = {
	ENTER: "return",
	KP_ENTER: "return",
	ESCAPE: "escape",
	BACKSPACE: "backspace",
	DELETE: "delete",
	TAB: "tab",
	UP: "up",
	DOWN: "down",
	LEFT: "left",
	RIGHT: "right",
	HOME: "home",
	END: "end",
	PAGE_UP: "pageup",
	PAGE_DOWN: "pagedown",
	INSERT: "insert",
	" ": "space",
};

const MODIFIER_PREFIXES = ["CTRL_", "ALT_", "META_", "SHIFT_"] as const;

/**
 * Normalise a terminal-kit key name ("CTRL_C", "SHIFT_TAB", "UP", "a", "Q")
 * into a KeyEvent ({ name: "c", ctrl: true }, ...)
 */
export function toKeyEvent(rawName: string): KeyEvent {
	let ctrl = false;
	let shift = false;
	let meta = false;
	let name = rawName;

	// Modifier prefixes may be stacked ("CTRL_ALT_X") but a bare "CTRL_" is not a prefix
	let matched = true;
	while (matched) {
		matched = false;
		for (const prefix of MODIFIER_PREFIXES) {
			if (name.startsWith(prefix) && name.length > prefix.length) {
				name = name.slice(prefix.length);
				if (prefix === "CTRL_") ctrl = true;
				else if (prefix === "SHIFT_") shift = true;
				else meta = true;
				matched = true;
			}
		}
	}

	const alias = KEY_ALIASES[name];
	if (alias !== undefined) {
		return { type: "key", name: alias, ctrl, shift, meta };
	}

	// terminal-kit spells modified letters in uppercase ("CTRL_C"); a bare
	// uppercase letter is a shifted keypress
	if ([...name].length === 1) {
		const lower = name.toLowerCase();
		const shifted = !ctrl && !meta && lower !== name;
		return { type: "key", name: lower, ctrl, shift: shift || shifted, meta };
	}

	return { type: "key", name: name.toLowerCase(), ctrl, shift, meta };
}
