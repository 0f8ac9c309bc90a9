import assert from "node:assert/strict";
import test from "node:test";
import { key } from "../../__tests__/fakes";
import { QueuedEventSource } from "../QueuedEventSource";

test("buffered events are read in push order", async () => {
	const source = new QueuedEventSource();
	source.push(key("a"));
	source.push(key("b"));

	assert.equal(source.size, 2);
	assert.deepEqual(await source.readNextEvent(), key("a"));
	assert.deepEqual(await source.readNextEvent(), key("b"));
	assert.equal(source.size, 0);
});

test("a waiting read receives the next push directly", async () => {
	const source = new QueuedEventSource();

	const next = source.readNextEvent();
	source.push(key("x"));

	assert.deepEqual(await next, key("x"));
	assert.equal(source.size, 0);
});

test("a full queue drops the oldest event", async () => {
	const source = new QueuedEventSource(2);
	source.push(key("1"));
	source.push(key("2"));
	source.push(key("3"));

	assert.equal(source.droppedCount, 1);
	assert.deepEqual(await source.readNextEvent(), key("2"));
	assert.deepEqual(await source.readNextEvent(), key("3"));
});

test("after a failure queued events drain before reads reject", async () => {
	const source = new QueuedEventSource();
	source.push(key("a"));
	source.fail(new Error("input lost"));
	source.fail(new Error("ignored"));
	source.push(key("b"));

	assert.deepEqual(await source.readNextEvent(), key("a"));
	await assert.rejects(source.readNextEvent(), /input lost/);
});

test("a failure rejects reads that are already waiting", async () => {
	const source = new QueuedEventSource();

	const waiting = source.readNextEvent();
	source.fail(new Error("input lost"));

	await assert.rejects(waiting, /input lost/);
});

test("capacity must be a positive integer", () => {
	assert.throws(() => new QueuedEventSource(0), RangeError);
	assert.throws(() => new QueuedEventSource(1.5), RangeError);
});
