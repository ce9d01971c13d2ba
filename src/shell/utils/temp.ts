// CHANGE: Scoped temporary directory for intermediate markup and PNG files
// WHY: Intermediate files must disappear on every exit path, failures included
// PURITY: SHELL (filesystem)
// EFFECT: Effect<string, OutputError, Scope>

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Effect, type Scope } from "effect";

import { OutputError } from "../../core/errors.js";

const messageOf = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Acquire a fresh directory under the OS temp dir; removed when the scope closes.
 */
export function scopedTempDir(
	prefix = "codesnap-",
): Effect.Effect<string, OutputError, Scope.Scope> {
	const template = path.join(os.tmpdir(), prefix);
	return Effect.acquireRelease(
		Effect.try({
			try: () => fs.mkdtempSync(template),
			catch: (error) => new OutputError({ path: template, detail: messageOf(error) }),
		}),
		(dir) =>
			Effect.try(() => fs.rmSync(dir, { recursive: true, force: true })).pipe(
				Effect.catchAll((error) =>
					Effect.sync(() => {
						console.warn(`⚠️  Could not remove ${dir}: ${messageOf(error.error)}`);
					}),
				),
			),
	);
}
