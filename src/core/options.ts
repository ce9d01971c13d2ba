// CHANGE: Pure merge of CLI flags over configuration defaults
// WHY: Precedence must be decided in one place so the shell never re-derives it
// PURITY: CORE
// INVARIANT: ∀ key: cli[key] defined → result[key] = cli[key]
// COMPLEXITY: O(1)

import type { Delivery } from "./models.js";
import type {
	CLIOptions,
	SnapshotConfig,
	SnapshotOptions,
} from "./types/index.js";

/**
 * Built-in configuration used when no config file overrides a key.
 *
 * @param homeDir - user's home directory (shots go to `~/shots`)
 * @pure true
 */
export function defaultConfig(homeDir: string): SnapshotConfig {
	return {
		style: "dracula",
		dpi: 70,
		width: 800,
		font: "mono",
		maxLines: 1000,
		splitAt: "\n\n",
		renderLineLimit: 1500,
		clipboard: "auto",
		shotsDir: `${homeDir.replace(/\/+$/, "")}/shots`,
		tools: {
			pangoView: "pango-view",
			ansifilter: "ansifilter",
			xclip: "xclip",
			wlCopy: "wl-copy",
			osascript: "osascript",
		},
	};
}

/**
 * Resolve effective pipeline settings.
 *
 * File input implies line numbers, a fixed render width and a title
 * showing the path; stdin input gets none of these unless asked.
 *
 * @pure true
 * @postcondition result.title = cli.title ?? cli.inputFile ?? null
 */
export function resolveOptions(
	cli: CLIOptions,
	config: SnapshotConfig,
): SnapshotOptions {
	const inputFile = cli.inputFile ?? null;
	const fromFile = inputFile !== null;
	return {
		inputFile,
		outputFile: cli.outputFile ?? null,
		shots: cli.shots,
		style: cli.style ?? config.style,
		dpi: cli.dpi ?? config.dpi,
		width: cli.width ?? config.width,
		fixWidth: cli.fixWidth || fromFile,
		font: cli.font ?? config.font,
		lang: cli.lang ?? null,
		title: cli.title ?? inputFile,
		lineNumbers: cli.lineNumbers || fromFile,
		startLine: cli.startLine,
		ansi: cli.ansi,
		maxLines: cli.maxLines ?? config.maxLines,
		maxLinesExplicit: cli.maxLines !== undefined,
		splitAt: cli.splitAt ?? config.splitAt,
		renderLineLimit: config.renderLineLimit,
		clipboard: config.clipboard,
		shotsDir: config.shotsDir,
		tools: config.tools,
	};
}

/**
 * Decide where images go: an explicit output file wins; the shots folder is
 * used only when it exists; otherwise the clipboard.
 *
 * @pure true
 */
export function chooseDelivery(
	options: Pick<SnapshotOptions, "outputFile" | "shots" | "shotsDir">,
	shotsDirExists: boolean,
): Delivery {
	if (options.outputFile !== null) {
		return { kind: "files", base: options.outputFile };
	}
	if (options.shots && shotsDirExists) {
		return { kind: "shots", dir: options.shotsDir };
	}
	return { kind: "clipboard" };
}

/**
 * Lines per chunk for this run.
 *
 * The clipboard holds one image, so a source that fits under the render
 * limit stays whole there unless `--maxlines` was given.
 *
 * @pure true
 * @postcondition delivery = clipboard ∧ ¬explicit ∧ lineCount ≤ renderLineLimit → one chunk
 *
 * @example
 * ```ts
 * chunkLimit({ maxLines: 1000, maxLinesExplicit: false, renderLineLimit: 1500 }, { kind: "clipboard" }, 1200);
 * // 1500
 * ```
 */
export function chunkLimit(
	options: Pick<SnapshotOptions, "maxLines" | "maxLinesExplicit" | "renderLineLimit">,
	delivery: Delivery,
	lineCount: number,
): number {
	const keepWhole =
		delivery.kind === "clipboard" &&
		!options.maxLinesExplicit &&
		lineCount <= options.renderLineLimit;
	return keepWhole ? Math.max(options.maxLines, options.renderLineLimit) : options.maxLines;
}
