// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE functions and typed errors; SHELL adapters stay internal
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effect programs or typed interfaces

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Snapshot orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runSnapshot } from "codesnap";
 *
 * const exitCode = await Effect.runPromise(
 *   runSnapshot({
 *     inputFile: "src/app.ts",
 *     outputFile: "app.png",
 *     startLine: 1,
 *     lineNumbers: true,
 *     fixWidth: true,
 *     ansi: false,
 *     shots: false,
 *     help: false,
 *   }),
 * );
 * ```
 *
 * @pure false - Orchestrates SHELL effects (files, pango-view, clipboard)
 * @returns ExitCode (0 = at least one image delivered, 1 = failure)
 */
export {
	buildMarkup,
	deliver,
	processEnvironment,
	renderAll,
	runFromArgv,
	runSnapshot,
	snapshotPipeline,
} from "./app/runSnapshot.js";
export type { MarkupPlan, RunEnvironment } from "./app/runSnapshot.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Chunk,
	Delivery,
	ExitCode,
	HighlightedText,
	RenderedImage,
	RenderOptions,
	SourceFile,
	StyledDocument,
	StyledLine,
	StyledSpan,
} from "./core/models.js";
export type {
	CLIOptions,
	ClipboardBackend,
	SnapshotConfig,
	SnapshotOptions,
	ToolCommands,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS (Effect.Data tagged errors)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	ConfigError,
	EmptyRender,
	ExternalToolError,
	HighlightError,
	InputFileError,
	MissingDeps,
	OutputError,
	SnippetTooLarge,
	TooManyImages,
	UsageError,
} from "./core/errors.js";
export type { AppError, ToolName } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export { describeFailure, failedStage } from "./core/format/diagnostic.js";
export {
	escapeMarkup,
	formatChunk,
	normalizeColor,
} from "./core/format/markup.js";
export { resolveLanguage } from "./core/language.js";
export { outputPaths } from "./core/naming.js";
export { chooseDelivery, defaultConfig, resolveOptions } from "./core/options.js";
export { isPng } from "./core/png.js";
export { splitIntoChunks } from "./core/split.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES (Effect Context tags for custom stages)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	ClipboardWriter,
	EscapeFilter,
	Highlighter,
	Renderer,
} from "./core/services.js";
