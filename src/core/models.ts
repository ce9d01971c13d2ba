// CHANGE: Functional Core domain models for the snapshot pipeline (pure, immutable)
// WHY: Every stage hands the next one a typed value instead of shell-piped text
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the snapshot process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Source text as read at invocation start.
 *
 * @remarks
 * - `path` is null when the text came from standard input
 * - @invariant text never ends with "\n" and contains no "\r\n"
 */
export interface SourceFile {
	readonly path: string | null;
	readonly text: string;
}

/**
 * A run of characters sharing one style.
 *
 * @remarks
 * - `color` is a normalised `#rrggbb` value or null for the default foreground
 */
export interface StyledSpan {
	readonly text: string;
	readonly color: string | null;
	readonly bold: boolean;
	readonly italic: boolean;
	readonly underline: boolean;
}

export type StyledLine = readonly StyledSpan[];

/**
 * Highlighter result: one entry per source line plus theme colours.
 *
 * @invariant lines.length === source.text.split("\n").length
 */
export interface StyledDocument {
	readonly lines: readonly StyledLine[];
	readonly background: string;
	readonly foreground: string;
	readonly commentColor: string;
}

/**
 * Half-open line range [startLine, endLine) of the source.
 *
 * @invariant 0 ≤ startLine < endLine
 */
export interface Chunk {
	readonly startLine: number;
	readonly endLine: number;
}

/**
 * Pango markup for one chunk, ready for the renderer.
 */
export interface HighlightedText {
	readonly markup: string;
	readonly lineCount: number;
}

/**
 * Renderer settings shared by every chunk of one invocation.
 */
export interface RenderOptions {
	readonly background: string;
	readonly foreground: string | null;
	readonly width: number | null;
	readonly dpi: number;
	readonly font: string;
}

/**
 * Image file produced by the renderer.
 *
 * @remarks
 * - bytes are read back from `path`; empty when the renderer wrote nothing
 * - only images passing `isPng` are ever delivered
 */
export interface RenderedImage {
	readonly path: string;
	readonly bytes: Uint8Array;
}

/**
 * Where rendered images end up.
 */
export type Delivery =
	| { readonly kind: "clipboard" }
	| { readonly kind: "files"; readonly base: string }
	| { readonly kind: "shots"; readonly dir: string };
