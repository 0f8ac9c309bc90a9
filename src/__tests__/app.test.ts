import assert from "node:assert/strict";
import test, { beforeEach } from "node:test";
import {
	changeView,
	getApplication,
	init,
	isLifecycleError,
	isRunning,
	resetApplication,
	run,
	stop,
} from "../app";
import { WelcomeView } from "../components";
import { colorSchemes } from "../config";
import { FakeBackend, RecordingView, ScriptedEvents, key } from "./fakes";

beforeEach(() => {
	resetApplication();
});

function notInitialized(operation: string) {
	return (error: unknown): boolean =>
		isLifecycleError(error, "NOT_INITIALIZED") &&
		error.message === `${operation}: application is not initialized. Did you call init()?`;
}

test("the module API rejects use before init", async () => {
	const backend = new FakeBackend();

	await assert.rejects(run({ backend, events: new ScriptedEvents([]) }), notInitialized("run"));
	await assert.rejects(stop(), notInitialized("stop"));
	await assert.rejects(changeView(new RecordingView("next")), notInitialized("changeView"));
	await assert.rejects(isRunning(), notInitialized("isRunning"));
	assert.equal(backend.acquired, 0);
});

test("init keeps the first view", async () => {
	const first = new RecordingView("first");
	await init(first);
	await init(new RecordingView("second"));

	assert.equal(await getApplication().store.renderCurrentView((view) => view), first);
	assert.equal(await isRunning(), true);
});

test("the demo views navigate through the shared application", async () => {
	await init(new WelcomeView(colorSchemes.zinc));
	const backend = new FakeBackend({ width: 40, height: 8 });
	const events = new ScriptedEvents([
		key("return"),
		key("up"),
		key("up"),
		key("escape"),
		key("q"),
	]);

	await run({ backend, events });

	const frames = backend.surface.frames;
	assert.equal(frames.length, 5);
	assert.equal(frames[0].line(2), `│ > Counter${" ".repeat(28)}│`);
	assert.equal(frames[1].line(2), `│ Count: 0${" ".repeat(29)}│`);
	assert.equal(frames[3].line(2), `│ Count: 2${" ".repeat(29)}│`);
	assert.equal(frames[4].line(2), `│ > Counter${" ".repeat(28)}│`);
	assert.equal(backend.released, 1);
	assert.equal(await isRunning(), false);
});

test("stop and changeView reach the running application from outside a view", async () => {
	const first = new RecordingView("first");
	const second = new RecordingView("second");
	second.onEvent = () => stop();
	await init(first);

	assert.equal(await changeView(second), true);
	assert.equal(await changeView(new RecordingView("third")), false);

	const backend = new FakeBackend();
	await run({ backend, events: new ScriptedEvents([key("x")]) });

	assert.equal(first.renders, 0);
	assert.equal(second.renders, 1);
	assert.equal(first.destroyed, 1);
});
