// CHANGE: macOS clipboard writer via osascript
// WHY: pbcopy only handles text; AppleScript can load PNG data as «class PNGf»
// PURITY: SHELL

import { Effect } from "effect";

import type { ExternalToolError } from "../../core/errors.js";
import type { RenderedImage } from "../../core/models.js";
import { formatCommand, runTool } from "../utils/exec.js";

/**
 * @pure true
 */
export function osascriptArgs(imagePath: string): readonly string[] {
	const quoted = imagePath.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
	return [
		"-e",
		`set the clipboard to (read (POSIX file "${quoted}") as «class PNGf»)`,
	];
}

export function writeWithOsascript(
	command: string,
	image: RenderedImage,
): Effect.Effect<void, ExternalToolError> {
	const args = osascriptArgs(image.path);
	return Effect.sync(() => {
		console.log(`   ↳ Command: ${formatCommand(command, args)}`);
	}).pipe(
		Effect.zipRight(runTool({ tool: "osascript", command, args })),
		Effect.asVoid,
	);
}
