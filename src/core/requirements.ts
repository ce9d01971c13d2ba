// CHANGE: Pure computation of which external programs a run needs
// WHY: Preflight must name every missing tool before any stage runs, so the
//      clipboard is never touched by a run that cannot finish
// PURITY: CORE
// INVARIANT: result contains pango-view; ansifilter iff ansi; a clipboard tool iff delivering to the clipboard
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { ToolName } from "./errors.js";
import type { Delivery } from "./models.js";
import type { ClipboardBackend, ToolCommands } from "./types/index.js";

export type ClipboardTool = "xclip" | "wl-copy" | "osascript";

export interface ToolRequirement {
	readonly tool: ToolName;
	readonly command: string;
	readonly hint: string;
}

/**
 * Pick the clipboard program for this session.
 *
 * @pure true
 *
 * @example
 * ```ts
 * selectClipboardTool("auto", "linux", { WAYLAND_DISPLAY: "wayland-0" }); // "wl-copy"
 * selectClipboardTool("auto", "darwin", {});                            // "osascript"
 * ```
 */
export function selectClipboardTool(
	setting: ClipboardBackend,
	platform: string,
	env: { readonly WAYLAND_DISPLAY?: string | undefined },
): ClipboardTool {
	return match(setting)
		.with("xclip", "wl-copy", "osascript", (explicit) => explicit)
		.with("auto", (): ClipboardTool => {
			if (platform === "darwin") return "osascript";
			const wayland = env.WAYLAND_DISPLAY;
			return wayland !== undefined && wayland.length > 0 ? "wl-copy" : "xclip";
		})
		.exhaustive();
}

const HINTS: Readonly<Record<ToolName, string>> = {
	"pango-view": "install Pango's command line tools (pango1.0-tools / pango)",
	ansifilter: "install ansifilter",
	xclip: "install xclip (X11)",
	"wl-copy": "install wl-clipboard (Wayland)",
	osascript: "osascript ships with macOS",
};

function commandFor(tool: ToolName, tools: ToolCommands): string {
	return match(tool)
		.with("pango-view", () => tools.pangoView)
		.with("ansifilter", () => tools.ansifilter)
		.with("xclip", () => tools.xclip)
		.with("wl-copy", () => tools.wlCopy)
		.with("osascript", () => tools.osascript)
		.exhaustive();
}

/**
 * External programs required for one run, in pipeline order.
 *
 * @param clipboardTool - only consulted when delivering to the clipboard
 * @pure true
 */
export function requiredTools(
	run: {
		readonly ansi: boolean;
		readonly delivery: Delivery;
		readonly tools: ToolCommands;
	},
	clipboardTool: ClipboardTool,
): readonly ToolRequirement[] {
	const names: ToolName[] = [];
	if (run.ansi) names.push("ansifilter");
	names.push("pango-view");
	if (run.delivery.kind === "clipboard") names.push(clipboardTool);
	return names.map((tool) => ({
		tool,
		command: commandFor(tool, run.tools),
		hint: HINTS[tool],
	}));
}
