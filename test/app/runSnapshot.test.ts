// CHANGE: Pipeline tests against in-memory services
// WHY: The clipboard must only change after a fully validated render, and a run that
//      delivered nothing must never exit 0
// INVARIANT: failure → clipboard untouched ∧ exit code 1

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect, Either, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
	buildMarkup,
	runFromArgv,
	runSnapshot,
	snapshotPipeline,
	type RunEnvironment,
} from "../../src/app/runSnapshot.js";
import { UsageError } from "../../src/core/errors.js";
import { formatChunk, titleMarkup } from "../../src/core/format/markup.js";
import type { Delivery } from "../../src/core/models.js";
import { defaultConfig, resolveOptions } from "../../src/core/options.js";
import { isPng } from "../../src/core/png.js";
import { ShikiHighlighterLive } from "../../src/shell/highlight/shiki.js";
import type { CLIOptions, SnapshotOptions } from "../../src/core/types/index.js";
import {
	FAKE_BACKGROUND,
	FAKE_COMMENT,
	FAKE_FOREGROUND,
	FakeEscapeFilter,
	fakePng,
	makeFakeClipboard,
	makeFakeHighlighter,
	makeFakeRenderer,
	plainDocument,
	type RenderMode,
} from "../utils/fakes.js";
import { createTempDir, type TempDir } from "../utils/tempDir.js";

const NOW = new Date(2024, 0, 5, 9, 3, 7);

const baseCli: CLIOptions = {
	startLine: 1,
	lineNumbers: false,
	fixWidth: false,
	ansi: false,
	shots: false,
	help: false,
};

function optionsFor(cli: Partial<CLIOptions>, homeDir: string): SnapshotOptions {
	return resolveOptions({ ...baseCli, ...cli }, defaultConfig(homeDir));
}

function setup(mode: RenderMode = "png") {
	const highlighter = makeFakeHighlighter();
	const renderer = makeFakeRenderer(mode);
	const clipboard = makeFakeClipboard();
	const layer = Layer.mergeAll(
		highlighter.layer,
		FakeEscapeFilter,
		renderer.layer,
		clipboard.layer,
	);
	return { highlighter, renderer, clipboard, layer };
}

const number = (n: number): string =>
	`<span fgcolor="${FAKE_COMMENT}">${String(n).padStart(5)} </span>`;

// Blank line every ten lines; with 1000 lines per chunk the first chunk ends at line 1009
const blankEveryTen = (length: number): string =>
	Array.from({ length }, (_, i) => (i % 10 === 9 ? "" : `value_${i} = ${i}`)).join("\n");

const longSource = blankEveryTen(2000);

describe("snapshotPipeline", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		vi.spyOn(console, "warn").mockImplementation(() => undefined);
	});

	afterEach(() => {
		temp.cleanup();
	});

	function run(
		options: SnapshotOptions,
		delivery: Delivery,
		fakes: ReturnType<typeof setup>,
	) {
		return Effect.runPromise(
			Effect.either(
				snapshotPipeline(options, delivery, () => NOW).pipe(
					Effect.provide(fakes.layer),
				),
			),
		);
	}

	it("puts exactly one PNG of the numbered, titled source on the clipboard", async () => {
		const file = temp.write("sample.ts", "const a = 1;\nconst b = 2;\n");
		const fakes = setup();
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);

		expect(Either.getOrThrow(result)).toBe(1);
		const markup = `${titleMarkup(file, FAKE_COMMENT)}${number(1)}const a = 1;\n${number(2)}const b = 2;`;
		expect(fakes.renderer.calls.map((c) => c.text)).toEqual([{ markup, lineCount: 2 }]);
		expect(fakes.renderer.calls[0]?.options).toEqual({
			background: FAKE_BACKGROUND,
			foreground: FAKE_FOREGROUND,
			width: 800,
			dpi: 70,
			font: "mono",
		});
		expect(fakes.highlighter.calls[0]).toEqual({
			text: "const a = 1;\nconst b = 2;",
			lang: "ts",
			theme: "dracula",
		});
		expect(fakes.clipboard.writes).toHaveLength(1);
		const bytes = fakes.clipboard.writes[0]?.bytes ?? new Uint8Array(0);
		expect(isPng(bytes)).toBe(true);
		expect(bytes).toEqual(fakePng(markup));
	});

	it("removes intermediate files once the run ends", async () => {
		const file = temp.write("sample.ts", "x\n");
		const fakes = setup();
		await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		const outPath = fakes.renderer.calls[0]?.outPath ?? "";
		expect(path.basename(outPath)).toBe("snippet-01.png");
		expect(fs.existsSync(path.dirname(outPath))).toBe(false);
	});

	it("produces identical images for identical input", async () => {
		const file = temp.write("sample.ts", "let x = 1;\n");
		const options = optionsFor({ inputFile: file }, temp.dir);
		const first = setup();
		const second = setup();
		await run(options, { kind: "clipboard" }, first);
		await run(options, { kind: "clipboard" }, second);
		expect(second.clipboard.writes[0]?.bytes).toEqual(first.clipboard.writes[0]?.bytes);
	});

	it("equals running highlighter, formatter and renderer by hand", async () => {
		const file = temp.write("sample.ts", "let y = 2;\n");
		const fakes = setup();
		await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		const direct = formatChunk(
			plainDocument("let y = 2;"),
			{ startLine: 0, endLine: 1 },
			{ lineNumbers: true, startLine: 1, title: file },
		);
		expect(fakes.clipboard.writes[0]?.bytes).toEqual(fakePng(direct.markup));
	});

	it("fails on a missing file without touching the clipboard", async () => {
		const missing = `${temp.dir}/absent.ts`;
		const fakes = setup();
		const result = await run(optionsFor({ inputFile: missing }, temp.dir), { kind: "clipboard" }, fakes);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({ _tag: "InputFileError", path: missing });
		expect(fakes.renderer.calls).toHaveLength(0);
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("refuses a chunk above the render limit before rendering", async () => {
		const text = Array.from({ length: 2000 }, (_, i) => `line ${i}`).join("\n");
		const file = temp.write("big.txt", `${text}\n`);
		const fakes = setup();
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({
			_tag: "SnippetTooLarge",
			chunk: 1,
			lines: 2000,
			limit: 1500,
		});
		expect(fakes.renderer.calls).toHaveLength(0);
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("refuses several images for the clipboard before rendering", async () => {
		const file = temp.write("long.py", `${longSource}\n`);
		const fakes = setup();
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({ _tag: "TooManyImages", count: 2 });
		expect(fakes.renderer.calls).toHaveLength(0);
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("keeps a file under the render limit whole for the clipboard", async () => {
		const file = temp.write("mid.ts", `${blankEveryTen(1200)}\n`);
		const fakes = setup();
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		expect(Either.getOrThrow(result)).toBe(1);
		expect(fakes.renderer.calls.map((c) => c.text.lineCount)).toEqual([1200]);
		expect(fakes.clipboard.writes).toHaveLength(1);
	});

	it("honours an explicit --maxlines even for the clipboard", async () => {
		const file = temp.write("mid.ts", `${blankEveryTen(1200)}\n`);
		const fakes = setup();
		const result = await run(
			optionsFor({ inputFile: file, maxLines: 1000 }, temp.dir),
			{ kind: "clipboard" },
			fakes,
		);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({ _tag: "TooManyImages", count: 2 });
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("saves every chunk when writing files, continuing line numbers", async () => {
		const file = temp.write("long.py", `${longSource}\n`);
		const fakes = setup();
		const base = `${temp.dir}/out.png`;
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "files", base }, fakes);

		expect(Either.getOrThrow(result)).toBe(2);
		expect(fakes.renderer.calls.map((c) => c.text.lineCount)).toEqual([1009, 991]);
		expect(
			fakes.renderer.calls[1]?.text.markup.startsWith(
				`${titleMarkup(file, FAKE_COMMENT)}${number(1010)}\n${number(1011)}value_1010 = 1010`,
			),
		).toBe(true);
		for (const target of [`${temp.dir}/out-1.png`, `${temp.dir}/out-2.png`]) {
			expect(isPng(new Uint8Array(fs.readFileSync(target)))).toBe(true);
		}
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("names screenshots after the clock", async () => {
		const file = temp.write("a.ts", "x\n");
		const fakes = setup();
		const dir = `${temp.dir}/shots`;
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "shots", dir }, fakes);
		expect(Either.getOrThrow(result)).toBe(1);
		expect(fs.existsSync(`${dir}/screenshot-20240105-090307-1.png`)).toBe(true);
	});

	it("detects a renderer that exits cleanly but writes nothing", async () => {
		const file = temp.write("a.ts", "x\n");
		const fakes = setup("empty");
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({
			_tag: "EmptyRender",
			chunk: 1,
			detail: "renderer reported success but wrote nothing",
		});
		expect(fakes.clipboard.writes).toHaveLength(0);
	});

	it("rejects output that is not a PNG", async () => {
		const file = temp.write("a.ts", "x\n");
		const fakes = setup("garbage");
		const result = await run(optionsFor({ inputFile: file }, temp.dir), { kind: "clipboard" }, fakes);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left).toMatchObject({
			_tag: "EmptyRender",
			detail: "output is not a PNG image",
		});
	});

	it("renders ANSI input through the escape filter with the theme background", async () => {
		const file = temp.write("log.txt", "\u001b[31mred\u001b[0m\n");
		const fakes = setup();
		const result = await run(
			optionsFor({ inputFile: file, ansi: true }, temp.dir),
			{ kind: "clipboard" },
			fakes,
		);
		expect(Either.getOrThrow(result)).toBe(1);
		expect(fakes.highlighter.calls).toEqual([{ text: "", lang: "text", theme: "dracula" }]);
		expect(fakes.renderer.calls[0]?.text.markup).toBe(
			'<span foreground="#ff0000">\u001b[31mred\u001b[0m</span>',
		);
		expect(fakes.renderer.calls[0]?.options.foreground).toBe("white");
		expect(fakes.renderer.calls[0]?.options.background).toBe(FAKE_BACKGROUND);
	});

	it("highlights unknown languages as plain text with a warning", async () => {
		const file = temp.write("a.ts", "x\n");
		const fakes = setup();
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const result = await run(
			optionsFor({ inputFile: file, lang: "klingon" }, temp.dir),
			{ kind: "clipboard" },
			fakes,
		);
		expect(Either.getOrThrow(result)).toBe(1);
		expect(warn).toHaveBeenCalledWith(
			'⚠️  Unknown language "klingon", highlighting as plain text',
		);
		expect(fakes.highlighter.calls[0]?.lang).toBe("text");
	});

	it("stops on a highlighting failure", async () => {
		const file = temp.write("a.ts", "x\n");
		const fakes = setup();
		const result = await run(
			optionsFor({ inputFile: file, style: "missing-theme" }, temp.dir),
			{ kind: "clipboard" },
			fakes,
		);
		if (Either.isRight(result)) throw new Error("expected failure");
		expect(result.left._tag).toBe("HighlightError");
		expect(fakes.clipboard.writes).toHaveLength(0);
	});
});

describe("buildMarkup", () => {
	it("gives plain text the theme foreground", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		const plan = await Effect.runPromise(
			buildMarkup({ path: null, text: "hello world" }, optionsFor({}, "/home/user")).pipe(
				Effect.provide(Layer.merge(ShikiHighlighterLive, FakeEscapeFilter)),
			),
		);
		expect(plan.chunks).toEqual([{ markup: "hello world", lineCount: 1 }]);
		expect(plan.render).toEqual({
			background: "#282a36",
			foreground: "#f8f8f2",
			width: null,
			dpi: 70,
			font: "mono",
		});
	});
});

describe("runSnapshot", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
		vi.spyOn(console, "log").mockImplementation(() => undefined);
	});

	afterEach(() => {
		temp.cleanup();
	});

	function environment(wayland?: string): RunEnvironment {
		return {
			cwd: temp.dir,
			homeDir: temp.dir,
			platform: "linux",
			env: { PATH: `${temp.dir}/empty-bin`, WAYLAND_DISPLAY: wayland },
			now: () => NOW,
		};
	}

	it("names every missing tool and exits 1", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const file = temp.write("a.ts", "x\n");
		const code = await Effect.runPromise(
			runSnapshot({ ...baseCli, inputFile: file }, environment()),
		);
		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith(
			"✖ preflight: missing required tools: pango-view (pango-view), xclip (xclip)",
		);
	});

	it("looks for wl-copy inside Wayland", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runSnapshot({ ...baseCli, inputFile: "a.ts" }, environment("wayland-0")),
		);
		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith(
			"✖ preflight: missing required tools: pango-view (pango-view), wl-copy (wl-copy)",
		);
	});

	it("needs only the renderer when saving files", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runSnapshot(
				{ ...baseCli, inputFile: "a.ts", outputFile: `${temp.dir}/a.png` },
				environment(),
			),
		);
		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith(
			"✖ preflight: missing required tool: pango-view (pango-view)",
		);
	});

	it("exits 0 once an image is delivered", async () => {
		const stub = temp.write(
			"bin/pango-view",
			[
				"#!/bin/sh",
				'while [ $# -gt 0 ]; do [ "$1" = "-o" ] && out="$2"; shift; done',
				"printf '\\211PNG\\r\\n\\032\\nstub' > \"$out\"",
				"",
			].join("\n"),
			0o755,
		);
		temp.write("codesnap.config.json", JSON.stringify({ tools: { pangoView: stub } }));
		const file = temp.write("a.ts", "x\n");
		const target = `${temp.dir}/out.png`;
		const code = await Effect.runPromise(
			runSnapshot({ ...baseCli, inputFile: file, outputFile: target }, environment()),
		);
		expect(code).toBe(0);
		expect(isPng(new Uint8Array(fs.readFileSync(target)))).toBe(true);
	});

	it("reports an unreadable configuration", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		temp.write("codesnap.config.json", "{");
		const code = await Effect.runPromise(
			runSnapshot({ ...baseCli, inputFile: "a.ts" }, environment()),
		);
		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith(
			expect.stringMatching(/^✖ config: .*codesnap\.config\.json: invalid JSON: /),
		);
	});
});

describe("runFromArgv", () => {
	it("reports usage errors with exit code 1", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runFromArgv(Either.left(new UsageError({ detail: "unknown option --x" })), () => undefined),
		);
		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith("✖ usage: unknown option --x (see --help)");
	});

	it("prints help and exits 0", async () => {
		const printUsage = vi.fn();
		const code = await Effect.runPromise(
			runFromArgv(Either.right({ ...baseCli, help: true }), printUsage),
		);
		expect(code).toBe(0);
		expect(printUsage).toHaveBeenCalledTimes(1);
	});
});
