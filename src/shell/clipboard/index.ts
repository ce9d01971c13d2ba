// CHANGE: Clipboard writer layer selected per platform/session
// WHY: The pipeline depends on the ClipboardWriter capability only; which program
//      backs it is decided once at startup
// PURITY: SHELL

import { Effect, Layer } from "effect";
import { match } from "ts-pattern";

import type { ClipboardTool } from "../../core/requirements.js";
import { ClipboardWriter } from "../../core/services.js";
import type { ToolCommands } from "../../core/types/index.js";
import { writeWithOsascript } from "./osascript.js";
import { writeWithWlCopy } from "./wl-copy.js";
import { writeWithXclip } from "./xclip.js";

export { osascriptArgs } from "./osascript.js";
export { WL_COPY_ARGS } from "./wl-copy.js";
export { xclipArgs } from "./xclip.js";

/**
 * Build the clipboard service for `tool`.
 */
export function makeClipboardLive(
	tool: ClipboardTool,
	tools: ToolCommands,
): Layer.Layer<ClipboardWriter> {
	return Layer.succeed(ClipboardWriter, {
		write: (image) =>
			Effect.sync(() => {
				console.log(`📋 Copying ${image.bytes.length} bytes of PNG to the clipboard via ${tool}`);
			}).pipe(
				Effect.zipRight(
					match(tool)
						.with("xclip", () => writeWithXclip(tools.xclip, image))
						.with("wl-copy", () => writeWithWlCopy(tools.wlCopy, image))
						.with("osascript", () => writeWithOsascript(tools.osascript, image))
						.exhaustive(),
				),
			),
	});
}
