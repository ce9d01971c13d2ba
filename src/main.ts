// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runSnapshot
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects

import type { Effect } from "effect";

import { runFromArgv } from "./app/runSnapshot.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, usage } from "./shell/config/cli.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - arguments after the executable and script name
 * @returns Effect yielding ExitCode (0 | 1)
 */
export function main(
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode, never> {
	return runFromArgv(parseCLIArgs(argv), () => console.log(usage()));
}
