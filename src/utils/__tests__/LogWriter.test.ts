import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test, { afterEach } from "node:test";
import { LogWriter, type LogWriterConfig } from "../LogWriter";

const dirs: string[] = [];
const writers: LogWriter[] = [];

afterEach(async () => {
	for (const writer of writers.splice(0)) {
		await writer.shutdown();
	}
	for (const dir of dirs.splice(0)) {
		rmSync(dir, { recursive: true, force: true });
	}
});

function createWriter(config: Partial<LogWriterConfig> = {}) {
	const logDir = mkdtempSync(join(tmpdir(), "viewloop-logs-"));
	dirs.push(logDir);
	const writer = new LogWriter({
		logDir,
		filename: "test.log",
		flushInterval: 60_000,
		...config,
	});
	writers.push(writer);
	const read = (name = "test.log") => readFileSync(join(logDir, name), "utf-8");
	const exists = (name: string) => existsSync(join(logDir, name));
	return { writer, logDir, read, exists };
}

async function waitFor(condition: () => boolean): Promise<void> {
	const deadline = Date.now() + 2000;
	while (!condition()) {
		if (Date.now() > deadline) {
			throw new Error("condition not met within 2s");
		}
		await new Promise((resolve) => setTimeout(resolve, 5));
	}
}

test("lines are buffered until flushed", async () => {
	const { writer, read, exists } = createWriter();

	writer.write("first");
	writer.write("second\n");
	assert.equal(exists("test.log"), false);

	await writer.flush();
	assert.equal(read(), "first\nsecond\n");
});

test("exceeding maxBufferedLines flushes without waiting for the timer", async () => {
	const { writer, read, exists } = createWriter({ maxBufferedLines: 2 });

	writer.write("a");
	writer.write("b");
	writer.write("c");

	await waitFor(() => exists("test.log") && read() === "a\nb\nc\n");
});

test("shutdown writes out what is still buffered", async () => {
	const { writer, read } = createWriter();

	writer.write("last words");
	await writer.shutdown();

	assert.equal(read(), "last words\n");
});

test("reaching maxFileSize rotates and keeps at most maxFiles old files", async () => {
	const { writer, read, exists } = createWriter({ maxFileSize: 10, maxFiles: 2 });

	for (const line of ["aaaaaaaaa", "bbbbbbbbb", "ccccccccc"]) {
		writer.write(line);
		await writer.flush();
	}

	assert.equal(exists("test.log"), false);
	assert.equal(read("test.log.1"), "ccccccccc\n");
	assert.equal(read("test.log.2"), "bbbbbbbbb\n");
	assert.equal(exists("test.log.3"), false);
});

test("an existing log file counts toward the rotation size", async () => {
	const logDir = mkdtempSync(join(tmpdir(), "viewloop-logs-"));
	dirs.push(logDir);
	writeFileSync(join(logDir, "test.log"), "earlier\n");
	const writer = new LogWriter({ logDir, filename: "test.log", maxFileSize: 10, flushInterval: 60_000 });
	writers.push(writer);

	writer.write("xy");
	await writer.flush();

	assert.equal(existsSync(join(logDir, "test.log")), false);
	assert.equal(readFileSync(join(logDir, "test.log.1"), "utf-8"), "earlier\nxy\n");
});

test("a disabled writer touches nothing", async () => {
	const parent = mkdtempSync(join(tmpdir(), "viewloop-logs-"));
	dirs.push(parent);
	const logDir = join(parent, "off");
	const writer = new LogWriter({ logDir, enabled: false });

	writer.write("ignored");
	await writer.shutdown();

	assert.equal(existsSync(logDir), false);
});
