// CHANGE: Pure conversion of styled lines into Pango markup
// WHY: The renderer only understands markup; keeping the conversion pure makes every
//      image a deterministic function of (document, chunk, options)
// PURITY: CORE
// INVARIANT: No side effects; escaped text never contains a raw "&", "<" or ">"
// COMPLEXITY: O(n) where n = total characters in the chunk

import type {
	Chunk,
	HighlightedText,
	StyledDocument,
	StyledLine,
	StyledSpan,
} from "../models.js";

const TITLE_RULE = "=".repeat(80);
const LINE_NUMBER_WIDTH = 5;

/**
 * Escape text for Pango markup.
 *
 * @pure true
 * @invariant escapeMarkup(s) contains no "<" or ">" and only entity "&"s
 */
export function escapeMarkup(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

/**
 * Normalise a CSS-style hex colour to `#rrggbb`.
 *
 * @returns lower-case `#rrggbb`, or null when the value is not a hex colour
 * @pure true
 *
 * @example
 * ```ts
 * normalizeColor("#F8F8F2")   // "#f8f8f2"
 * normalizeColor("#6272A4CC") // "#6272a4"
 * normalizeColor("#abc")      // "#aabbcc"
 * ```
 */
export function normalizeColor(value: string | null | undefined): string | null {
	if (value === null || value === undefined) return null;
	const hex = /^#([0-9a-fA-F]+)$/.exec(value.trim())?.[1];
	if (hex === undefined) return null;
	const lower = hex.toLowerCase();
	if (lower.length === 3 || lower.length === 4) {
		return `#${[...lower.slice(0, 3)].map((c) => c + c).join("")}`;
	}
	if (lower.length === 6 || lower.length === 8) {
		return `#${lower.slice(0, 6)}`;
	}
	return null;
}

function sameStyle(a: StyledSpan, b: StyledSpan): boolean {
	return (
		a.color === b.color &&
		a.bold === b.bold &&
		a.italic === b.italic &&
		a.underline === b.underline
	);
}

/**
 * Merge adjacent spans that share a style.
 *
 * @pure true
 * @postcondition concat(result.text) = concat(line.text)
 */
export function mergeSpans(line: StyledLine): StyledLine {
	const merged: StyledSpan[] = [];
	for (const span of line) {
		if (span.text.length === 0) continue;
		const last = merged.at(-1);
		if (last !== undefined && sameStyle(last, span)) {
			merged[merged.length - 1] = { ...last, text: last.text + span.text };
		} else {
			merged.push(span);
		}
	}
	return merged;
}

/**
 * Wrap one span in its style tags.
 *
 * @pure true
 */
export function spanToMarkup(span: StyledSpan): string {
	let open = "";
	let close = "";
	if (span.color !== null) {
		open += `<span fgcolor="${span.color}">`;
		close = `</span>${close}`;
	}
	if (span.bold) {
		open += "<b>";
		close = `</b>${close}`;
	}
	if (span.italic) {
		open += "<i>";
		close = `</i>${close}`;
	}
	if (span.underline) {
		open += "<u>";
		close = `</u>${close}`;
	}
	return open + escapeMarkup(span.text) + close;
}

/**
 * @pure true
 */
export function lineToMarkup(line: StyledLine): string {
	return mergeSpans(line).map(spanToMarkup).join("");
}

/**
 * Right-aligned line number in the comment colour.
 *
 * @pure true
 * @example lineNumberMarkup(7, "#6272a4") === '<span fgcolor="#6272a4">    7 </span>'
 */
export function lineNumberMarkup(lineNo: number, color: string): string {
	return `<span fgcolor="${color}">${String(lineNo).padStart(LINE_NUMBER_WIDTH)} </span>`;
}

/**
 * Title banner shown above every chunk.
 *
 * @pure true
 */
export function titleMarkup(title: string, color: string): string {
	return `<span fgcolor="${color}">\n${TITLE_RULE}\n${escapeMarkup(title)}\n${TITLE_RULE}\n</span>\n`;
}

export interface FormatOptions {
	readonly lineNumbers: boolean;
	readonly startLine: number;
	readonly title: string | null;
}

/**
 * Format one chunk of a styled document as Pango markup.
 *
 * Line numbers are absolute: line `i` of the document is numbered
 * `startLine + i`, so numbering continues across chunks.
 *
 * @pure true
 * @invariant result.lineCount = chunk.endLine - chunk.startLine
 */
export function formatChunk(
	doc: StyledDocument,
	chunk: Chunk,
	options: FormatOptions,
): HighlightedText {
	const lines: string[] = [];
	for (let i = chunk.startLine; i < chunk.endLine; i += 1) {
		const body = lineToMarkup(doc.lines[i] ?? []);
		lines.push(
			options.lineNumbers
				? lineNumberMarkup(options.startLine + i, doc.commentColor) + body
				: body,
		);
	}
	const header =
		options.title === null ? "" : titleMarkup(options.title, doc.commentColor);
	return {
		markup: header + lines.join("\n"),
		lineCount: chunk.endLine - chunk.startLine,
	};
}
