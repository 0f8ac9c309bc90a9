import assert from "node:assert/strict";
import test from "node:test";
import { toKeyEvent } from "../keys";

const cases: Array<[string, { name: string; ctrl?: boolean; shift?: boolean; meta?: boolean }]> = [
	["a", { name: "a" }],
	["Q", { name: "q", shift: true }],
	["CTRL_C", { name: "c", ctrl: true }],
	["ALT_X", { name: "x", meta: true }],
	["META_X", { name: "x", meta: true }],
	["SHIFT_TAB", { name: "tab", shift: true }],
	["CTRL_ALT_DELETE", { name: "delete", ctrl: true, meta: true }],
	["ENTER", { name: "return" }],
	["KP_ENTER", { name: "return" }],
	["ESCAPE", { name: "escape" }],
	["PAGE_DOWN", { name: "pagedown" }],
	["UP", { name: "up" }],
	[" ", { name: "space" }],
	["F1", { name: "f1" }],
];

for (const [raw, expected] of cases) {
	test(`normalises ${JSON.stringify(raw)}`, () => {
		assert.deepEqual(toKeyEvent(raw), {
			type: "key",
			name: expected.name,
			ctrl: expected.ctrl ?? false,
			shift: expected.shift ?? false,
			meta: expected.meta ?? false,
		});
	});
}
