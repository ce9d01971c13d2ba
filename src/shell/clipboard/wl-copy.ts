// CHANGE: Wayland clipboard writer via wl-copy
// WHY: Under Wayland, X11 selections do not reach native clients
// PURITY: SHELL

import { Effect } from "effect";

import type { ExternalToolError } from "../../core/errors.js";
import type { RenderedImage } from "../../core/models.js";
import { formatCommand, runToolDetached } from "../utils/exec.js";

export const WL_COPY_ARGS: readonly string[] = ["--type", "image/png"];

/**
 * Image bytes go on stdin; wl-copy keeps serving them after it returns.
 */
export function writeWithWlCopy(
	command: string,
	image: RenderedImage,
): Effect.Effect<void, ExternalToolError> {
	return Effect.sync(() => {
		console.log(`   ↳ Command: ${formatCommand(command, WL_COPY_ARGS)} < ${image.path}`);
	}).pipe(
		Effect.zipRight(
			runToolDetached({
				tool: "wl-copy",
				command,
				args: WL_COPY_ARGS,
				input: image.bytes,
			}),
		),
	);
}
