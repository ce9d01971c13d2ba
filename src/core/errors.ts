// CHANGE: Typed error ADT for every pipeline stage using Effect.Data
// WHY: Each failure must name the stage that failed; untyped exceptions lose that
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Names of the external programs the pipeline can shell out to.
 */
export type ToolName =
	| "pango-view"
	| "ansifilter"
	| "xclip"
	| "wl-copy"
	| "osascript";

/**
 * Invalid command line usage (unknown flag, missing or malformed value).
 *
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Configuration file exists but cannot be read or validated.
 *
 * @invariant path.length > 0 ∧ detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Required external programs are not on PATH.
 *
 * @invariant deps.length > 0
 */
export class MissingDeps extends Data.TaggedError("MissingDeps")<{
	readonly deps: readonly {
		readonly tool: ToolName;
		readonly command: string;
		readonly hint: string;
	}[];
}> {}

/**
 * Source file missing, unreadable or not a regular file.
 *
 * @invariant detail.length > 0
 */
export class InputFileError extends Data.TaggedError("InputFileError")<{
	readonly path: string | null;
	readonly detail: string;
}> {}

/**
 * In-process highlighter failed (theme or grammar could not be loaded).
 */
export class HighlightError extends Data.TaggedError("HighlightError")<{
	readonly lang: string;
	readonly theme: string;
	readonly detail: string;
}> {}

/**
 * External tool exited abnormally.
 *
 * @invariant reason.length > 0
 */
export class ExternalToolError extends Data.TaggedError("ExternalToolError")<{
	readonly tool: ToolName;
	readonly reason: string;
}> {}

/**
 * A chunk exceeds the number of lines the renderer is trusted with.
 *
 * @invariant lines > limit
 */
export class SnippetTooLarge extends Data.TaggedError("SnippetTooLarge")<{
	readonly chunk: number;
	readonly lines: number;
	readonly limit: number;
}> {}

/**
 * Renderer exited successfully but left no usable PNG behind.
 */
export class EmptyRender extends Data.TaggedError("EmptyRender")<{
	readonly chunk: number;
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Clipboard holds a single image but several were rendered.
 *
 * @invariant count > 1
 */
export class TooManyImages extends Data.TaggedError("TooManyImages")<{
	readonly count: number;
}> {}

/**
 * Writing rendered images to their destination failed.
 */
export class OutputError extends Data.TaggedError("OutputError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| UsageError
	| ConfigError
	| MissingDeps
	| InputFileError
	| HighlightError
	| ExternalToolError
	| SnippetTooLarge
	| EmptyRender
	| TooManyImages
	| OutputError;
