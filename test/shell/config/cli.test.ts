// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags and positional arguments must parse deterministically; bad input is a typed UsageError
// INVARIANT: ∀ argv: parseCLIArgs(argv) = Right(options) ∨ Left(UsageError)

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { parseCLIArgs, usage } from "../../../src/shell/config/cli.js";
import type { CLIOptions } from "../../../src/core/types/index.js";

function parsed(args: readonly string[]): CLIOptions {
	const result = parseCLIArgs(args);
	if (Either.isLeft(result)) throw new Error(result.left.detail);
	return result.right;
}

function failure(args: readonly string[]): string {
	const result = parseCLIArgs(args);
	if (Either.isRight(result)) throw new Error("expected a usage error");
	return result.left.detail;
}

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		expect(parsed([])).toEqual({
			startLine: 1,
			lineNumbers: false,
			fixWidth: false,
			ansi: false,
			shots: false,
			help: false,
		});
	});

	it("parses a single positional as the input file", (): void => {
		expect(parsed(["src/app.ts"]).inputFile).toBe("src/app.ts");
	});

	it("treats '-' as standard input", (): void => {
		expect(parsed(["-"]).inputFile).toBeUndefined();
	});

	it("ignores empty string arguments", (): void => {
		expect(parsed(["", "src/app.ts"]).inputFile).toBe("src/app.ts");
	});

	it("rejects a second positional", (): void => {
		expect(failure(["a.ts", "b.ts"])).toBe('unexpected extra argument "b.ts"');
	});
});

describe("parseCLIArgs: value flags", () => {
	it("reads short and long forms", (): void => {
		const opts = parsed([
			"-f",
			"main.py",
			"--style",
			"nord",
			"-o",
			"shot.png",
			"-l",
			"python",
			"-t",
			"Demo",
			"--font",
			"Fira Code 12",
		]);
		expect(opts).toMatchObject({
			inputFile: "main.py",
			style: "nord",
			outputFile: "shot.png",
			lang: "python",
			title: "Demo",
			font: "Fira Code 12",
		});
	});

	it("accepts --flag=value", (): void => {
		const opts = parsed(["--dpi=144", "--width=1200", "--config=alt.json"]);
		expect([opts.dpi, opts.width, opts.configPath]).toEqual([144, 1200, "alt.json"]);
	});

	it("decodes escapes in the split sequence", (): void => {
		expect(parsed(["-c", "\\n"]).splitAt).toBe("\n");
	});

	it("allows negative start lines", (): void => {
		expect(parsed(["-s", "-5"]).startLine).toBe(-5);
	});

	it("rejects non-integers", (): void => {
		expect(failure(["--dpi", "abc"])).toBe('--dpi expects an integer, got "abc"');
	});

	it("rejects values below the minimum", (): void => {
		expect(failure(["-m", "0"])).toBe("-m must be at least 1, got 0");
	});

	it("rejects a value flag at the end", (): void => {
		expect(failure(["-o"])).toBe("-o expects a value");
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("sets every switch", (): void => {
		const opts = parsed(["-n", "-x", "-a", "-y", "-h"]);
		expect([opts.lineNumbers, opts.fixWidth, opts.ansi, opts.shots, opts.help]).toEqual([
			true,
			true,
			true,
			true,
			true,
		]);
	});

	it("rejects a value on a switch", (): void => {
		expect(failure(["--linenos=yes"])).toBe("--linenos takes no value");
	});

	it("rejects unknown options", (): void => {
		expect(failure(["--bogus"])).toBe("unknown option --bogus");
	});
});

describe("usage", () => {
	it("starts with the synopsis", (): void => {
		expect(usage().split("\n")[0]).toBe("Usage: codesnap [file] [options]");
	});
});
