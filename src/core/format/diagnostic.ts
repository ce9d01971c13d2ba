// CHANGE: Exhaustive mapping from typed errors to user-facing diagnostics
// WHY: Every failure must name the stage that failed; adding an error tag without a
//      message must fail to compile
// PURITY: CORE
// INVARIANT: ∀ e ∈ AppError: describeFailure(e) starts with "✖ <stage>:"
// COMPLEXITY: O(k) where k = number of missing dependencies

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

/**
 * Pipeline stage an error belongs to.
 *
 * @pure true
 */
export function failedStage(error: AppError): string {
	return match(error)
		.with({ _tag: "UsageError" }, () => "usage")
		.with({ _tag: "ConfigError" }, () => "config")
		.with({ _tag: "MissingDeps" }, () => "preflight")
		.with({ _tag: "InputFileError" }, () => "read")
		.with({ _tag: "HighlightError" }, () => "highlight")
		.with({ _tag: "ExternalToolError", tool: "ansifilter" }, () => "escape-filter")
		.with({ _tag: "ExternalToolError", tool: "pango-view" }, () => "render")
		.with({ _tag: "ExternalToolError" }, () => "clipboard")
		.with({ _tag: "SnippetTooLarge" }, () => "render")
		.with({ _tag: "EmptyRender" }, () => "render")
		.with({ _tag: "TooManyImages" }, () => "clipboard")
		.with({ _tag: "OutputError" }, () => "output")
		.exhaustive();
}

function detailOf(error: AppError): string {
	return match(error)
		.with({ _tag: "UsageError" }, (e) => `${e.detail} (see --help)`)
		.with({ _tag: "ConfigError" }, (e) => `${e.path}: ${e.detail}`)
		.with(
			{ _tag: "MissingDeps" },
			(e) =>
				`missing required tool${e.deps.length > 1 ? "s" : ""}: ${e.deps
					.map((d) => `${d.tool} (${d.command})`)
					.join(", ")}`,
		)
		.with(
			{ _tag: "InputFileError" },
			(e) => `${e.path ?? "<stdin>"}: ${e.detail}`,
		)
		.with(
			{ _tag: "HighlightError" },
			(e) => `${e.lang} with theme ${e.theme}: ${e.detail}`,
		)
		.with({ _tag: "ExternalToolError" }, (e) => `${e.tool}: ${e.reason}`)
		.with(
			{ _tag: "SnippetTooLarge" },
			(e) =>
				`chunk ${e.chunk} has ${e.lines} lines, limit is ${e.limit}; lower --maxlines or choose a --splitat that occurs in the file`,
		)
		.with(
			{ _tag: "EmptyRender" },
			(e) => `chunk ${e.chunk} produced no image at ${e.path} (${e.detail})`,
		)
		.with(
			{ _tag: "TooManyImages" },
			(e) =>
				`${e.count} images were rendered but the clipboard holds one; use --outputfile`,
		)
		.with({ _tag: "OutputError" }, (e) => `${e.path}: ${e.detail}`)
		.exhaustive();
}

/**
 * One-line diagnostic for a failed run.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeFailure(new TooManyImages({ count: 2 }));
 * // "✖ clipboard: 2 images were rendered but the clipboard holds one; use --outputfile"
 * ```
 */
export function describeFailure(error: AppError): string {
	return `✖ ${failedStage(error)}: ${detailOf(error)}`;
}
