// CHANGE: Line-based splitting of large sources into renderable chunks
// WHY: The renderer cannot be trusted with arbitrarily long inputs; splitting at a
//      separator (blank line by default) keeps each image readable and bounded
// PURITY: CORE
// INVARIANT: chunks are contiguous, non-empty and cover [0, lineCount) exactly once
// COMPLEXITY: O(n) where n = |text|

import { SnippetTooLarge } from "./errors.js";
import type { Chunk } from "./models.js";

export interface SplitOptions {
	readonly maxLines: number;
	readonly splitAt: string;
}

/**
 * Offsets of the first character of every line.
 *
 * @pure true
 * @invariant result[0] = 0 ∧ result.length = lineCount
 */
export function lineStartOffsets(text: string): readonly number[] {
	const starts: number[] = [0];
	let pos = text.indexOf("\n");
	while (pos !== -1) {
		starts.push(pos + 1);
		pos = text.indexOf("\n", pos + 1);
	}
	return starts;
}

/**
 * Index of the line containing `offset` (binary search over line starts).
 *
 * @pure true
 */
function lineIndexAt(starts: readonly number[], offset: number): number {
	let lo = 0;
	let hi = starts.length - 1;
	while (lo < hi) {
		const mid = Math.ceil((lo + hi) / 2);
		if ((starts[mid] ?? 0) <= offset) lo = mid;
		else hi = mid - 1;
	}
	return lo;
}

/**
 * Split `text` into chunks of roughly `maxLines` lines.
 *
 * Once a chunk has reached `maxLines - 1` lines the next occurrence of
 * `splitAt` closes it; the chunk ends with the line the match starts on.
 * Without a further match the remainder stays one chunk. An empty
 * `splitAt` matches immediately, giving a hard split every `maxLines`.
 *
 * @param text - source text, lines separated by "\n"
 * @returns ordered chunks
 *
 * @pure true
 * @precondition maxLines ≥ 1
 * @postcondition result[0].startLine = 0 ∧ last.endLine = lineCount
 *
 * @example
 * ```ts
 * splitIntoChunks("a\nb\n\nc\nd", { maxLines: 2, splitAt: "\n\n" });
 * // [{ startLine: 0, endLine: 2 }, { startLine: 2, endLine: 5 }]
 * ```
 */
export function splitIntoChunks(
	text: string,
	options: SplitOptions,
): readonly Chunk[] {
	const maxLines = Math.max(1, Math.floor(options.maxLines));
	const starts = lineStartOffsets(text);
	const lineCount = starts.length;
	const chunks: Chunk[] = [];

	let start = 0;
	while (start < lineCount) {
		if (lineCount - start <= maxLines) {
			chunks.push({ startLine: start, endLine: lineCount });
			break;
		}
		const searchFrom = starts[start + maxLines - 1] ?? text.length;
		const match = text.indexOf(options.splitAt, searchFrom);
		if (match < 0) {
			chunks.push({ startLine: start, endLine: lineCount });
			break;
		}
		const end = lineIndexAt(starts, match) + 1;
		chunks.push({ startLine: start, endLine: end });
		start = end;
	}

	return chunks;
}

/**
 * Decode the two escapes users type on a shell line for `--splitat`.
 *
 * @pure true
 * @example decodeSeparator("\\n\\n") === "\n\n"
 */
export function decodeSeparator(raw: string): string {
	return raw.replace(/\\([nt\\])/g, (_m, ch: string) =>
		ch === "n" ? "\n" : ch === "t" ? "\t" : "\\",
	);
}

/**
 * First chunk whose line count exceeds `limit`, as a typed error.
 *
 * @returns SnippetTooLarge for the offending chunk (1-based) or null
 * @pure true
 */
export function findOversizedChunk(
	lineCounts: readonly number[],
	limit: number,
): SnippetTooLarge | null {
	const index = lineCounts.findIndex((count) => count > limit);
	if (index < 0) return null;
	return new SnippetTooLarge({
		chunk: index + 1,
		lines: lineCounts[index] ?? 0,
		limit,
	});
}
