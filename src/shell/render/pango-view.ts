// CHANGE: Renderer stage rasterising Pango markup with pango-view
// WHY: pango-view renders markup with system fonts and exits; the markup goes through a
//      file because very long argv or stdin handling differs between Pango releases
// PURITY: SHELL (filesystem + external command)
// EFFECT: Effect<RenderedImage, ExternalToolError>
// INVARIANT: Returned bytes are exactly what pango-view left at outPath (possibly empty)
// COMPLEXITY: O(n) where n = |markup| + |png|

import * as fs from "node:fs";
import { Effect, Layer } from "effect";

import { ExternalToolError } from "../../core/errors.js";
import type { RenderOptions } from "../../core/models.js";
import { Renderer } from "../../core/services.js";
import { formatCommand, runTool } from "../utils/exec.js";

/**
 * pango-view arguments for one chunk.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderArgs({ background: "#282a36", foreground: null, width: 800, dpi: 70, font: "mono" }, "in.markup", "out.png");
 * // ["--background=#282a36", "--markup", "--width=800", "--wrap=word-char", "--font=mono", "--dpi=70", "-q", "-o", "out.png", "in.markup"]
 * ```
 */
export function renderArgs(
	options: RenderOptions,
	inputPath: string,
	outPath: string,
): readonly string[] {
	return [
		`--background=${options.background}`,
		"--markup",
		...(options.width === null ? [] : [`--width=${options.width}`]),
		...(options.foreground === null
			? []
			: [`--foreground=${options.foreground}`]),
		"--wrap=word-char",
		`--font=${options.font}`,
		`--dpi=${options.dpi}`,
		"-q",
		"-o",
		outPath,
		inputPath,
	];
}

function readIfPresent(filePath: string): Effect.Effect<Uint8Array, ExternalToolError> {
	return Effect.try({
		try: () =>
			fs.existsSync(filePath)
				? new Uint8Array(fs.readFileSync(filePath))
				: new Uint8Array(0),
		catch: (error) =>
			new ExternalToolError({
				tool: "pango-view",
				reason: `cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

/**
 * Build the renderer service around the given pango-view executable.
 */
export function makePangoViewLive(command: string): Layer.Layer<Renderer> {
	return Layer.succeed(Renderer, {
		render: (text, options, outPath) =>
			Effect.gen(function* () {
				const inputPath = `${outPath}.markup`;
				yield* Effect.try({
					try: () => fs.writeFileSync(inputPath, text.markup, "utf8"),
					catch: (error) =>
						new ExternalToolError({
							tool: "pango-view",
							reason: `cannot write markup to ${inputPath}: ${String(error)}`,
						}),
				});
				const args = renderArgs(options, inputPath, outPath);
				console.log(`🖼️  Rendering ${text.lineCount} lines`);
				console.log(`   ↳ Command: ${formatCommand(command, args)}`);
				yield* runTool({ tool: "pango-view", command, args });
				const bytes = yield* readIfPresent(outPath);
				return { path: outPath, bytes };
			}),
	});
}
