// CHANGE: Application layer orchestrating the snapshot pipeline
// WHY: APP composes pure CORE logic with SHELL services and returns an ExitCode value;
//      every stage's failure is checked explicitly instead of assumed away
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: The clipboard is written at most once, and only after every image passed validation
// COMPLEXITY: O(n) where n = source length

import * as os from "node:os";
import { Effect, Either, Layer } from "effect";

import { computeExitCodeEffect } from "../core/decision.js";
import {
	EmptyRender,
	type AppError,
	type ExternalToolError,
	type HighlightError,
	type MissingDeps,
	type OutputError,
	TooManyImages,
} from "../core/errors.js";
import { describeFailure } from "../core/format/diagnostic.js";
import { formatChunk } from "../core/format/markup.js";
import { PLAIN_TEXT, resolveLanguage } from "../core/language.js";
import type {
	Delivery,
	ExitCode,
	HighlightedText,
	RenderedImage,
	RenderOptions,
	SourceFile,
} from "../core/models.js";
import { outputPaths, shotBase } from "../core/naming.js";
import { chooseDelivery, chunkLimit, resolveOptions } from "../core/options.js";
import { isPng } from "../core/png.js";
import {
	type ClipboardTool,
	requiredTools,
	selectClipboardTool,
} from "../core/requirements.js";
import {
	ClipboardWriter,
	EscapeFilter,
	Highlighter,
	Renderer,
} from "../core/services.js";
import {
	findOversizedChunk,
	lineStartOffsets,
	splitIntoChunks,
} from "../core/split.js";
import type { CLIOptions, SnapshotOptions } from "../core/types/index.js";
import { makeClipboardLive } from "../shell/clipboard/index.js";
import { loadConfig } from "../shell/config/loader.js";
import { makeAnsifilterLive } from "../shell/highlight/ansifilter.js";
import { ShikiHighlighterLive } from "../shell/highlight/shiki.js";
import { isDirectory, writeImages } from "../shell/output/files.js";
import { makePangoViewLive } from "../shell/render/pango-view.js";
import { readSource } from "../shell/source/reader.js";
import {
	checkDependencies,
	reportMissingDependencies,
} from "../shell/utils/dependencies.js";
import { scopedTempDir } from "../shell/utils/temp.js";

/**
 * Process-level facts the run depends on, injectable for tests.
 */
export interface RunEnvironment {
	readonly cwd: string;
	readonly homeDir: string;
	readonly platform: string;
	readonly env: {
		readonly PATH?: string | undefined;
		readonly WAYLAND_DISPLAY?: string | undefined;
	};
	readonly now: () => Date;
}

export function processEnvironment(): RunEnvironment {
	return {
		cwd: process.cwd(),
		homeDir: os.homedir(),
		platform: process.platform,
		env: {
			PATH: process.env.PATH,
			WAYLAND_DISPLAY: process.env.WAYLAND_DISPLAY,
		},
		now: () => new Date(),
	};
}

/**
 * Markup for every chunk plus the renderer settings derived from the theme.
 */
export interface MarkupPlan {
	readonly chunks: readonly HighlightedText[];
	readonly render: RenderOptions;
}

/**
 * Highlight (or escape-filter) the source and cut it into renderable chunks.
 *
 * @effect Effect<MarkupPlan, HighlightError | ExternalToolError, Highlighter | EscapeFilter>
 */
export function buildMarkup(
	source: SourceFile,
	options: SnapshotOptions,
): Effect.Effect<
	MarkupPlan,
	HighlightError | ExternalToolError,
	Highlighter | EscapeFilter
> {
	return Effect.gen(function* () {
		const highlighter = yield* Highlighter;
		const width = options.fixWidth ? options.width : null;

		if (options.ansi) {
			// Theme colours only; the text keeps its own escapes.
			const theme = yield* highlighter.highlight("", PLAIN_TEXT, options.style);
			const filter = yield* EscapeFilter;
			const markup = yield* filter.toMarkup(source.text);
			return {
				chunks: [markup],
				render: {
					background: theme.background,
					foreground: "white",
					width,
					dpi: options.dpi,
					font: options.font,
				},
			};
		}

		const choice = resolveLanguage(
			{ lang: options.lang, path: source.path },
			highlighter.supports,
		);
		if (choice.unsupported !== null) {
			console.warn(
				`⚠️  Unknown language "${choice.unsupported}", highlighting as plain text`,
			);
		}
		console.log(`🎨 Highlighting as ${choice.lang} with theme ${options.style}`);
		const doc = yield* highlighter.highlight(
			source.text,
			choice.lang,
			options.style,
		);

		const ranges = splitIntoChunks(source.text, {
			maxLines: options.maxLines,
			splitAt: options.splitAt,
		});
		if (ranges.length > 1) {
			console.log(`✂️  Split into ${ranges.length} chunks`);
		}
		const chunks = ranges.map((range) =>
			formatChunk(doc, range, {
				lineNumbers: options.lineNumbers,
				startLine: options.startLine,
				title: options.title,
			}),
		);
		return {
			chunks,
			render: {
				background: doc.background,
				foreground: doc.foreground,
				width,
				dpi: options.dpi,
				font: options.font,
			},
		};
	});
}

/**
 * Render every chunk and verify each output really is a PNG.
 *
 * @invariant ∀ image ∈ result: isPng(image.bytes)
 */
export function renderAll(
	plan: MarkupPlan,
	tmpDir: string,
): Effect.Effect<readonly RenderedImage[], ExternalToolError | EmptyRender, Renderer> {
	return Effect.gen(function* () {
		const renderer = yield* Renderer;
		return yield* Effect.forEach(plan.chunks, (chunk, i) =>
			Effect.gen(function* () {
				const outPath = `${tmpDir}/snippet-${String(i + 1).padStart(2, "0")}.png`;
				const image = yield* renderer.render(chunk, plan.render, outPath);
				if (!isPng(image.bytes)) {
					return yield* Effect.fail(
						new EmptyRender({
							chunk: i + 1,
							path: outPath,
							detail:
								image.bytes.length === 0
									? "renderer reported success but wrote nothing"
									: "output is not a PNG image",
						}),
					);
				}
				return image;
			}),
		);
	});
}

/**
 * Hand images to their destination.
 *
 * @returns number of images delivered
 */
export function deliver(
	images: readonly RenderedImage[],
	delivery: Delivery,
	now: () => Date,
): Effect.Effect<number, TooManyImages | ExternalToolError | OutputError, ClipboardWriter> {
	return Effect.gen(function* () {
		if (delivery.kind === "files") {
			const written = yield* writeImages(images, outputPaths(delivery.base, images.length));
			return written.length;
		}
		if (delivery.kind === "shots") {
			const base = shotBase(delivery.dir, now());
			const written = yield* writeImages(images, outputPaths(base, images.length));
			return written.length;
		}
		const [first, ...rest] = images;
		if (first === undefined) return 0;
		if (rest.length > 0) {
			return yield* Effect.fail(new TooManyImages({ count: images.length }));
		}
		const clipboard = yield* ClipboardWriter;
		yield* clipboard.write(first);
		console.log("✅ Image copied to the clipboard");
		return 1;
	});
}

/**
 * The snapshot pipeline: read → highlight → split → validate → render → deliver.
 *
 * @returns number of images delivered
 * @effect Effect<number, AppError, Highlighter | EscapeFilter | Renderer | ClipboardWriter>
 */
export function snapshotPipeline(
	options: SnapshotOptions,
	delivery: Delivery,
	now: () => Date,
): Effect.Effect<
	number,
	AppError,
	Highlighter | EscapeFilter | Renderer | ClipboardWriter
> {
	return Effect.scoped(
		Effect.gen(function* () {
			console.log(`📸 Snapshot of ${options.inputFile ?? "<stdin>"}`);
			const source = yield* readSource(options.inputFile);
			const maxLines = chunkLimit(
				options,
				delivery,
				lineStartOffsets(source.text).length,
			);
			const plan = yield* buildMarkup(source, { ...options, maxLines });

			const oversized = findOversizedChunk(
				plan.chunks.map((c) => c.lineCount),
				options.renderLineLimit,
			);
			if (oversized !== null) return yield* Effect.fail(oversized);
			if (delivery.kind === "clipboard" && plan.chunks.length > 1) {
				return yield* Effect.fail(
					new TooManyImages({ count: plan.chunks.length }),
				);
			}

			const tmpDir = yield* scopedTempDir();
			const images = yield* renderAll(plan, tmpDir);
			return yield* deliver(images, delivery, now);
		}),
	);
}

/**
 * Live layers for the tools this run resolved.
 *
 * @pure true (layer construction only)
 */
export function liveLayers(
	options: SnapshotOptions,
	clipboardTool: ClipboardTool,
): Layer.Layer<Highlighter | EscapeFilter | Renderer | ClipboardWriter> {
	return Layer.mergeAll(
		ShikiHighlighterLive,
		makeAnsifilterLive(options.tools.ansifilter),
		makePangoViewLive(options.tools.pangoView),
		makeClipboardLive(clipboardTool, options.tools),
	);
}

function reportFailure(error: AppError): Effect.Effect<void> {
	return Effect.sync(() => {
		if (error._tag === "MissingDeps") {
			reportMissingDependencies(error.deps);
		}
		console.error(describeFailure(error));
	});
}

function preflight(
	options: SnapshotOptions,
	delivery: Delivery,
	environment: RunEnvironment,
): Effect.Effect<ClipboardTool, MissingDeps> {
	const clipboardTool = selectClipboardTool(
		options.clipboard,
		environment.platform,
		environment.env,
	);
	const requirements = requiredTools(
		{ ansi: options.ansi, delivery, tools: options.tools },
		clipboardTool,
	);
	return checkDependencies(requirements, environment.env.PATH).pipe(
		Effect.as(clipboardTool),
	);
}

/**
 * Orchestrates one snapshot run and returns ExitCode as value (no process.exit).
 *
 * @param cli - Parsed CLI options
 * @param environment - process facts (cwd, home, PATH, platform, clock)
 * @returns Effect<ExitCode, never>
 *
 * @invariant ExitCode ∈ {0,1}
 * @postcondition result = 0 → at least one image was delivered
 */
export function runSnapshot(
	cli: CLIOptions,
	environment: RunEnvironment = processEnvironment(),
): Effect.Effect<ExitCode, never> {
	const run = Effect.gen(function* () {
		const config = yield* loadConfig(
			cli.configPath ?? null,
			environment.cwd,
			environment.homeDir,
		);
		const options = resolveOptions(cli, config);
		const delivery = chooseDelivery(options, isDirectory(options.shotsDir));
		const clipboardTool = yield* preflight(options, delivery, environment);
		return yield* snapshotPipeline(options, delivery, environment.now).pipe(
			Effect.provide(liveLayers(options, clipboardTool)),
		);
	});

	return run.pipe(
		Effect.flatMap((delivered) =>
			computeExitCodeEffect({ failed: false, delivered }),
		),
		Effect.catchAll((error: AppError) =>
			reportFailure(error).pipe(
				Effect.zipRight(computeExitCodeEffect({ failed: true, delivered: 0 })),
			),
		),
	);
}

/**
 * Parse-and-run entry used by the binary.
 */
export function runFromArgv(
	parsed: Either.Either<CLIOptions, AppError>,
	printUsage: () => void,
	environment?: RunEnvironment,
): Effect.Effect<ExitCode, never> {
	if (Either.isLeft(parsed)) {
		return reportFailure(parsed.left).pipe(Effect.as<ExitCode>(1));
	}
	if (parsed.right.help) {
		return Effect.sync(printUsage).pipe(Effect.as<ExitCode>(0));
	}
	return runSnapshot(parsed.right, environment);
}
