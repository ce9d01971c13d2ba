// CHANGE: Dependency checker resolving external tools on PATH before the pipeline starts
// WHY: A missing renderer or clipboard program must stop the run with its name,
//      not surface later as an obscure spawn error
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<readonly string[], MissingDeps>

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { MissingDeps } from "../../core/errors.js";
import type { ToolRequirement } from "../../core/requirements.js";

function isExecutableFile(candidate: string): boolean {
	try {
		if (!fs.statSync(candidate).isFile()) return false;
		fs.accessSync(candidate, fs.constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Находит исполняемый файл в каталогах PATH.
 *
 * @param command Имя программы или путь к ней
 * @param pathEnv Значение переменной PATH
 * @returns Абсолютный путь или null, если программа не найдена
 */
export function resolveExecutable(
	command: string,
	pathEnv: string | undefined,
): string | null {
	if (command.includes("/")) {
		const direct = path.resolve(command);
		return isExecutableFile(direct) ? direct : null;
	}
	for (const dir of (pathEnv ?? "").split(path.delimiter)) {
		if (dir.length === 0) continue;
		const candidate = path.join(dir, command);
		if (isExecutableFile(candidate)) return candidate;
	}
	return null;
}

/**
 * Проверяет наличие всех необходимых программ.
 *
 * @returns Пути найденных программ в порядке требований или MissingDeps со всеми отсутствующими
 */
export function checkDependencies(
	requirements: readonly ToolRequirement[],
	pathEnv: string | undefined,
): Effect.Effect<readonly string[], MissingDeps> {
	return Effect.gen(function* () {
		const resolved = yield* Effect.sync(() =>
			requirements.map((req) => ({
				req,
				found: resolveExecutable(req.command, pathEnv),
			})),
		);
		const missing = resolved.filter((r) => r.found === null).map((r) => r.req);
		if (missing.length > 0) {
			return yield* Effect.fail(new MissingDeps({ deps: missing }));
		}
		return resolved.flatMap((r) => (r.found === null ? [] : [r.found]));
	});
}

/**
 * Выводит информацию о недостающих зависимостях.
 *
 * @param missing Список недостающих зависимостей
 */
export function reportMissingDependencies(
	missing: readonly ToolRequirement[],
): void {
	console.error("\n❌ Missing required dependencies:\n");

	for (const dep of missing) {
		console.error(`  • ${dep.tool} (${dep.command})`);
		console.error(`    Install: ${dep.hint}\n`);
	}

	console.error("Please install the missing dependencies and try again.\n");
}
