// CHANGE: Tests for reading source text from files and streams
// INVARIANT: Missing input fails before any tool runs

import { Readable } from "node:stream";
import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	readSourceFile,
	readSourceStream,
} from "../../../src/shell/source/reader.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

describe("readSourceFile", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("reads and normalises the file", async () => {
		const file = temp.write("main.py", "x = 1\r\ny = 2\n");
		await expect(Effect.runPromise(readSourceFile(file))).resolves.toEqual({
			path: file,
			text: "x = 1\ny = 2",
		});
	});

	it("reports a missing file", async () => {
		const missing = `${temp.dir}/absent.py`;
		const result = await Effect.runPromise(Effect.either(readSourceFile(missing)));
		if (Either.isRight(result)) throw new Error("expected InputFileError");
		expect(result.left.path).toBe(missing);
		expect(result.left.detail).toBe("no such file");
	});

	it("reports a directory", async () => {
		const result = await Effect.runPromise(Effect.either(readSourceFile(temp.dir)));
		if (Either.isRight(result)) throw new Error("expected InputFileError");
		expect(result.left.detail).toBe("is a directory");
	});
});

describe("readSourceStream", () => {
	it("collects string and buffer chunks and trims the tail", async () => {
		const stream = Readable.from(["def f():\n", Buffer.from("    pass\n\n")]);
		await expect(Effect.runPromise(readSourceStream(stream))).resolves.toEqual({
			path: null,
			text: "def f():\n    pass",
		});
	});
});
