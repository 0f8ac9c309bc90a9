import assert from "node:assert/strict";
import test from "node:test";
import { FakeTerminal } from "../../__tests__/fakes";
import { MIN_TERM_HEIGHT, MIN_TERM_WIDTH } from "../../config/constants";
import { TerminalKitBackend } from "../TerminalKitBackend";
import { hexToRgb, sanitizeTermSize } from "../termkit";

test("acquire enters the alternate screen and grabs input", async () => {
	const term = new FakeTerminal(3, 1);
	const backend = new TerminalKitBackend(term);

	await backend.acquire();

	assert.deepEqual(term.calls, ["fullscreen:true", "hideCursor:true", "grabInput:true", "clear"]);
});

test("the first frame writes every cell grouped by style", async () => {
	const term = new FakeTerminal(3, 1);
	const surface = await new TerminalKitBackend(term).acquire();
	term.calls.length = 0;

	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "ab", { bold: true, fg: "#ff0000" });
	});

	assert.deepEqual(term.calls, [
		"styleReset",
		"moveTo:1,1",
		"colorRgb:255,0,0",
		"bold",
		"write:ab",
		"styleReset",
		"moveTo:3,1",
		"write: ",
		"styleReset",
	]);
});

test("later frames write only changed cells", async () => {
	const term = new FakeTerminal(3, 1);
	const surface = await new TerminalKitBackend(term).acquire();
	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "abc");
	});
	term.calls.length = 0;

	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "abc");
	});
	assert.deepEqual(term.calls, ["styleReset"]);

	term.calls.length = 0;
	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "aXc", { inverse: true }, { x: 1, y: 0, width: 1, height: 1 });
		buffer.setString(0, 0, "a");
		buffer.setString(2, 0, "c");
	});
	assert.deepEqual(term.calls, ["styleReset", "moveTo:2,1", "inverse", "write:X", "styleReset"]);
});

test("a resized terminal is cleared and fully redrawn", async () => {
	const term = new FakeTerminal(2, 1);
	const surface = await new TerminalKitBackend(term).acquire();
	await surface.draw(() => undefined);
	term.resize(3, 1);
	term.calls.length = 0;

	await surface.draw(() => undefined);

	assert.deepEqual(term.calls, ["clear", "styleReset", "moveTo:1,1", "write:   ", "styleReset"]);
});

test("changing every cell at the same size redraws without clearing", async () => {
	const term = new FakeTerminal(2, 1);
	const surface = await new TerminalKitBackend(term).acquire();
	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "ab");
	});
	term.calls.length = 0;

	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "cd");
	});

	assert.deepEqual(term.calls, ["styleReset", "moveTo:1,1", "write:cd", "styleReset"]);
});

test("adjacent astral code points are written as one span", async () => {
	const term = new FakeTerminal(3, 1);
	const surface = await new TerminalKitBackend(term).acquire();
	term.calls.length = 0;

	await surface.draw(({ buffer }) => {
		buffer.setString(0, 0, "\u{1F600}\u{1F600}\u{1F600}");
	});

	assert.deepEqual(term.calls, [
		"styleReset",
		"moveTo:1,1",
		"write:\u{1F600}\u{1F600}\u{1F600}",
		"styleReset",
	]);
});

test("frames fall back to the minimum size when the terminal reports none", async () => {
	const term = new FakeTerminal(0, Number.NaN);
	const surface = await new TerminalKitBackend(term).acquire();
	let area = { x: -1, y: -1, width: -1, height: -1 };

	await surface.draw((frame) => {
		area = frame.area;
	});

	assert.deepEqual(area, { x: 0, y: 0, width: MIN_TERM_WIDTH, height: MIN_TERM_HEIGHT });
});

test("release restores the terminal once", async () => {
	const term = new FakeTerminal(3, 1);
	const backend = new TerminalKitBackend(term);
	const surface = await backend.acquire();
	term.calls.length = 0;

	await backend.release(surface);
	await backend.release(surface);

	assert.deepEqual(term.calls, ["grabInput:false", "styleReset", "hideCursor:false", "fullscreen:false"]);
});

test("without the alternate screen the screen is cleared instead", async () => {
	const term = new FakeTerminal(3, 1);
	const backend = new TerminalKitBackend(term, { alternateScreen: false });

	const surface = await backend.acquire();
	await backend.release(surface);

	assert.deepEqual(term.calls, [
		"hideCursor:true",
		"grabInput:true",
		"clear",
		"grabInput:false",
		"styleReset",
		"hideCursor:false",
		"clear",
	]);
});

test("hexToRgb parses long and short forms", () => {
	assert.deepEqual(hexToRgb("#0d1117"), [13, 17, 23]);
	assert.deepEqual(hexToRgb("#fff"), [255, 255, 255]);
	assert.equal(hexToRgb(""), null);
	assert.equal(hexToRgb("blue"), null);
});

test("sanitizeTermSize keeps positive sizes and floors them", () => {
	assert.equal(sanitizeTermSize(80.7, 40), 80);
	assert.equal(sanitizeTermSize(undefined, 40), 40);
	assert.equal(sanitizeTermSize(-1, 12), 12);
});
