// CHANGE: Escape-filter stage converting ANSI colour codes to Pango markup via ansifilter
// WHY: Terminal output (test runs, diffs) already carries its colours; re-highlighting would lose them
// PURITY: SHELL (executes external command)
// EFFECT: Effect<HighlightedText, ExternalToolError>
// INVARIANT: Logged command equals the one executed
// COMPLEXITY: O(n) where n = |text|

import { Effect, Layer } from "effect";

import type { HighlightedText } from "../../core/models.js";
import { EscapeFilter } from "../../core/services.js";
import { formatCommand, runTool } from "../utils/exec.js";

/**
 * Arguments passed to ansifilter; the font matches the renderer's default.
 */
export const ANSIFILTER_ARGS: readonly string[] = [
	"--font=mono",
	"--font-size=12",
	"--pango",
];

/**
 * Build the escape-filter service around the given ansifilter executable.
 */
export function makeAnsifilterLive(command: string): Layer.Layer<EscapeFilter> {
	return Layer.succeed(EscapeFilter, {
		toMarkup: (text) =>
			Effect.gen(function* () {
				console.log("🎨 Converting ANSI escapes to markup");
				console.log(`   ↳ Command: ${formatCommand(command, ANSIFILTER_ARGS)}`);
				const { stdout } = yield* runTool({
					tool: "ansifilter",
					command,
					args: ANSIFILTER_ARGS,
					input: text,
				});
				const result: HighlightedText = {
					markup: stdout,
					lineCount: stdout.length === 0 ? 0 : stdout.split("\n").length,
				};
				return result;
			}),
	});
}
