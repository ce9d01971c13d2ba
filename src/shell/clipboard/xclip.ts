// CHANGE: X11 clipboard writer via xclip
// WHY: xclip forks a selection owner that must not inherit our pipes (it would hang the run)
// PURITY: SHELL

import { Effect } from "effect";

import type { ExternalToolError } from "../../core/errors.js";
import type { RenderedImage } from "../../core/models.js";
import { formatCommand, runToolDetached } from "../utils/exec.js";

/**
 * @pure true
 */
export function xclipArgs(imagePath: string): readonly string[] {
	return ["-selection", "clipboard", "-t", "image/png", "-i", imagePath];
}

export function writeWithXclip(
	command: string,
	image: RenderedImage,
): Effect.Effect<void, ExternalToolError> {
	const args = xclipArgs(image.path);
	return Effect.sync(() => {
		console.log(`   ↳ Command: ${formatCommand(command, args)}`);
	}).pipe(
		Effect.zipRight(runToolDetached({ tool: "xclip", command, args })),
	);
}
