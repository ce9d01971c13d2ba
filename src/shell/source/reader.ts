// CHANGE: Source reader for a file path or standard input
// WHY: Missing or unreadable input must fail before any tool runs
// PURITY: SHELL (filesystem / stdin)
// EFFECT: Effect<SourceFile, InputFileError>

import * as fs from "node:fs";
import { Effect } from "effect";

import { InputFileError } from "../../core/errors.js";
import type { SourceFile } from "../../core/models.js";
import { normalizeSourceText } from "../../core/source.js";

function reasonOf(error: unknown): string {
	if (error instanceof Error && "code" in error) {
		if (error.code === "ENOENT") return "no such file";
		if (error.code === "EACCES") return "permission denied";
		if (error.code === "EISDIR") return "is a directory";
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Read a source file as UTF-8.
 *
 * @pure false
 * @effect Effect<SourceFile, InputFileError>
 */
export function readSourceFile(
	filePath: string,
): Effect.Effect<SourceFile, InputFileError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(filePath, "utf8"),
		catch: (error) =>
			new InputFileError({ path: filePath, detail: reasonOf(error) }),
	}).pipe(
		Effect.map((text) => ({
			path: filePath,
			text: normalizeSourceText(text, false),
		})),
	);
}

/**
 * Read all of a stream (standard input by default).
 *
 * @pure false
 */
export function readSourceStream(
	stream: NodeJS.ReadableStream = process.stdin,
): Effect.Effect<SourceFile, InputFileError> {
	return Effect.tryPromise({
		try: async () => {
			const parts: Buffer[] = [];
			for await (const chunk of stream) {
				parts.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
			}
			return Buffer.concat(parts).toString("utf8");
		},
		catch: (error) => new InputFileError({ path: null, detail: reasonOf(error) }),
	}).pipe(
		Effect.map((text) => ({ path: null, text: normalizeSourceText(text, true) })),
	);
}

export function readSource(
	filePath: string | null,
): Effect.Effect<SourceFile, InputFileError> {
	return filePath === null ? readSourceStream() : readSourceFile(filePath);
}
