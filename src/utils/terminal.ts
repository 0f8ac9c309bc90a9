import { spawnSync } from "node:child_process";

/**
 * ANSI escape sequences for terminal control
 */
const ESCAPE_SEQUENCES = {
	// Mouse tracking modes
	MOUSE_CLICK_OFF: "\x1b[?1000l",
	MOUSE_BUTTON_OFF: "\x1b[?1002l",
	MOUSE_ALL_OFF: "\x1b[?1003l",
	MOUSE_SGR_OFF: "\x1b[?1006l",

	CURSOR_SHOW: "\x1b[?25h",
	ALT_SCREEN_OFF: "\x1b[?1049l",
	RESET_ATTRS: "\x1b[0m",
} as const;

/**
 * Last-resort terminal restore for paths where the run loop never reached
 * its own release (crash handlers, forced exit).
 */
export function cleanupTerminal(output: NodeJS.WriteStream = process.stdout): void {
	if (!output.isTTY) return;

	output.write(
		ESCAPE_SEQUENCES.MOUSE_CLICK_OFF +
			ESCAPE_SEQUENCES.MOUSE_BUTTON_OFF +
			ESCAPE_SEQUENCES.MOUSE_ALL_OFF +
			ESCAPE_SEQUENCES.MOUSE_SGR_OFF +
			ESCAPE_SEQUENCES.CURSOR_SHOW +
			ESCAPE_SEQUENCES.ALT_SCREEN_OFF +
			ESCAPE_SEQUENCES.RESET_ATTRS,
	);

	if (process.stdin.isTTY) {
		process.stdin.setRawMode(false);
	}
	try {
		spawnSync("stty", ["sane"], { stdio: "inherit" });
	} catch {
		// stty is unavailable on Windows; raw mode was already reset above
	}
}

