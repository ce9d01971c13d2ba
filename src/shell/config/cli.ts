// CHANGE: CLI argument parsing for the snapshot command
// WHY: Lookup tables keep every flag's handling flat; invalid input becomes a typed
//      UsageError instead of a silently ignored token
// PURITY: SHELL boundary helper (pure over the argv it is given)
// INVARIANT: ∀ argv: parseCLIArgs(argv) = Right(options) ∨ Left(UsageError)

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import { decodeSeparator } from "../../core/split.js";
import type { CLIOptions } from "../../core/types/index.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type ParseState = Mutable<CLIOptions>;

type NumericKey = "dpi" | "width" | "maxLines" | "startLine";
type StringKey =
	| "inputFile"
	| "outputFile"
	| "style"
	| "font"
	| "lang"
	| "title"
	| "splitAt"
	| "configPath";
type BooleanKey = "lineNumbers" | "fixWidth" | "ansi" | "shots" | "help";

interface NumericSpec {
	readonly key: NumericKey;
	readonly min: number | null;
}

// CHANGE: Lookup tables instead of a chain of ifs
// WHY: Keeps processArgument flat as flags are added
const numericFlags: Readonly<Record<string, NumericSpec>> = {
	"--dpi": { key: "dpi", min: 1 },
	"-w": { key: "width", min: 1 },
	"--width": { key: "width", min: 1 },
	"-m": { key: "maxLines", min: 1 },
	"--maxlines": { key: "maxLines", min: 1 },
	"-s": { key: "startLine", min: null },
	"--startline": { key: "startLine", min: null },
};

const stringFlags: Readonly<Record<string, StringKey>> = {
	"-f": "inputFile",
	"--inputfile": "inputFile",
	"-o": "outputFile",
	"--outputfile": "outputFile",
	"--style": "style",
	"--font": "font",
	"-l": "lang",
	"--lang": "lang",
	"-t": "title",
	"--title": "title",
	"-c": "splitAt",
	"--splitat": "splitAt",
	"--config": "configPath",
};

const booleanFlags: Readonly<Record<string, BooleanKey>> = {
	"-n": "lineNumbers",
	"--linenos": "lineNumbers",
	"-x": "fixWidth",
	"--fixwidth": "fixWidth",
	"-a": "ansi",
	"--ansi": "ansi",
	"-y": "shots",
	"--sshoot": "shots",
	"-h": "help",
	"--help": "help",
};

function setField<K extends keyof ParseState>(
	state: ParseState,
	key: K,
	value: ParseState[K],
): ParseState {
	const next: ParseState = { ...state };
	next[key] = value;
	return next;
}

function lookup<T>(table: Readonly<Record<string, T>>, flag: string): T | undefined {
	return Object.hasOwn(table, flag) ? table[flag] : undefined;
}

/**
 * Parse an integer flag value.
 *
 * @pure true
 */
function parseInteger(
	flag: string,
	raw: string,
	min: number | null,
): Either.Either<number, UsageError> {
	if (!/^-?\d+$/.test(raw)) {
		return Either.left(
			new UsageError({ detail: `${flag} expects an integer, got "${raw}"` }),
		);
	}
	const value = Number.parseInt(raw, 10);
	if (min !== null && value < min) {
		return Either.left(
			new UsageError({ detail: `${flag} must be at least ${min}, got ${value}` }),
		);
	}
	return Either.right(value);
}

/**
 * Split "--flag=value" into its parts; other tokens pass through.
 *
 * @pure true
 */
function splitInline(token: string): { readonly flag: string; readonly inline: string | null } {
	if (!token.startsWith("--")) return { flag: token, inline: null };
	const eq = token.indexOf("=");
	return eq < 0
		? { flag: token, inline: null }
		: { flag: token.slice(0, eq), inline: token.slice(eq + 1) };
}

interface Step {
	readonly state: ParseState;
	readonly consumed: number;
}

/**
 * Apply one token (and possibly its value) to the parse state.
 *
 * @pure true
 * @postcondition result.consumed ∈ {1, 2}
 */
function processArgument(
	args: readonly string[],
	index: number,
	state: ParseState,
): Either.Either<Step, UsageError> {
	const token = args[index] ?? "";
	const { flag, inline } = splitInline(token);

	const takeValue = (): Either.Either<{ value: string; consumed: number }, UsageError> => {
		if (inline !== null) return Either.right({ value: inline, consumed: 1 });
		const next = args[index + 1];
		return next === undefined
			? Either.left(new UsageError({ detail: `${flag} expects a value` }))
			: Either.right({ value: next, consumed: 2 });
	};

	const numeric = lookup(numericFlags, flag);
	if (numeric !== undefined) {
		return Either.flatMap(takeValue(), ({ value, consumed }) =>
			Either.map(parseInteger(flag, value, numeric.min), (n) => ({
				state: setField(state, numeric.key, n),
				consumed,
			})),
		);
	}

	const stringKey = lookup(stringFlags, flag);
	if (stringKey !== undefined) {
		return Either.map(takeValue(), ({ value, consumed }) => ({
			state: setField(
				state,
				stringKey,
				stringKey === "splitAt" ? decodeSeparator(value) : value,
			),
			consumed,
		}));
	}

	const booleanKey = lookup(booleanFlags, flag);
	if (booleanKey !== undefined) {
		return inline === null
			? Either.right({ state: setField(state, booleanKey, true), consumed: 1 })
			: Either.left(new UsageError({ detail: `${flag} takes no value` }));
	}

	if (token.startsWith("-") && token !== "-") {
		return Either.left(new UsageError({ detail: `unknown option ${token}` }));
	}

	if (state.inputFile !== undefined) {
		return Either.left(
			new UsageError({ detail: `unexpected extra argument "${token}"` }),
		);
	}
	// "-" reads standard input explicitly
	if (token === "-") return Either.right({ state, consumed: 1 });
	return Either.right({ state: { ...state, inputFile: token }, consumed: 1 });
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Аргументы без node и имени скрипта
 * @returns Опции командной строки или UsageError
 *
 * @example
 * ```ts
 * // Command: codesnap src/app.ts --style nord -o shot.png
 * parseCLIArgs(["src/app.ts", "--style", "nord", "-o", "shot.png"]);
 * // Right({ inputFile: "src/app.ts", style: "nord", outputFile: "shot.png", ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	let state: ParseState = {
		startLine: 1,
		lineNumbers: false,
		fixWidth: false,
		ansi: false,
		shots: false,
		help: false,
	};

	let i = 0;
	while (i < args.length) {
		if ((args[i] ?? "").length === 0) {
			i += 1;
			continue;
		}
		const step = processArgument(args, i, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		i += step.right.consumed;
	}

	return Either.right(state);
}

/**
 * Usage text printed for --help.
 *
 * @pure true
 */
export function usage(): string {
	return [
		"Usage: codesnap [file] [options]",
		"",
		"Render a source file (or stdin) as a syntax-highlighted PNG and copy it to the clipboard.",
		"",
		"Options:",
		"  -f, --inputfile <path>   Input source file (default: stdin)",
		"  -o, --outputfile <path>  Save PNG(s) instead of copying to the clipboard",
		"      --dpi <n>            DPI of the result image (default: 70)",
		"      --style <name>       Highlighting theme (default: dracula)",
		"      --font <desc>        Pango font description (default: mono)",
		"  -l, --lang <id>          Force the language to highlight as",
		"  -t, --title <text>       Title banner (default: the input path)",
		"  -n, --linenos            Show line numbers (always on for files)",
		"  -s, --startline <n>      First line number (default: 1)",
		"  -x, --fixwidth           Pass --width to the renderer (always on for files)",
		"  -w, --width <n>          Render width (default: 800)",
		"  -a, --ansi               Input is ANSI-coloured text; convert with ansifilter",
		"  -m, --maxlines <n>       Lines per image before splitting (default: 1000)",
		"  -c, --splitat <s>        Only split at this sequence (default: \\n\\n)",
		"  -y, --sshoot             Save into the screenshots folder (~/shots)",
		"      --config <path>      Configuration file (default: ./codesnap.config.json)",
		"  -h, --help               Show this help",
	].join("\n");
}
