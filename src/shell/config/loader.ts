// CHANGE: Load codesnap.config.json and merge it over built-in defaults
// WHY: Theme, font and tool paths are per-machine settings that should not need flags
// PURITY: SHELL (reads filesystem); validation helpers are pure
// EFFECT: Effect<SnapshotConfig, ConfigError>
// INVARIANT: Every key present in the file is validated; a bad value names its key

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect, Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import { defaultConfig } from "../../core/options.js";
import type {
	ClipboardBackend,
	SnapshotConfig,
	ToolCommands,
} from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "codesnap.config.json";

type JSONObject = { readonly [key: string]: unknown };

/**
 * Type guard to check if value is a JSON object.
 */
function isJSONObject(value: unknown): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const CLIPBOARD_BACKENDS: readonly ClipboardBackend[] = [
	"auto",
	"xclip",
	"wl-copy",
	"osascript",
];

function isClipboardBackend(value: unknown): value is ClipboardBackend {
	return CLIPBOARD_BACKENDS.some((b) => b === value);
}

const TOOL_KEYS: readonly (keyof ToolCommands)[] = [
	"pangoView",
	"ansifilter",
	"xclip",
	"wlCopy",
	"osascript",
];

type Validation<T> = Either.Either<T, string>;

function optionalString(
	obj: JSONObject,
	key: string,
	label = key,
): Validation<string | undefined> {
	const value = obj[key];
	if (value === undefined) return Either.right(undefined);
	return typeof value === "string" && value.length > 0
		? Either.right(value)
		: Either.left(`"${label}" must be a non-empty string`);
}

function optionalPositiveInt(obj: JSONObject, key: string): Validation<number | undefined> {
	const value = obj[key];
	if (value === undefined) return Either.right(undefined);
	return typeof value === "number" && Number.isInteger(value) && value > 0
		? Either.right(value)
		: Either.left(`"${key}" must be a positive integer`);
}

/**
 * Expand a leading "~" to the home directory.
 *
 * @pure true
 */
export function expandHome(value: string, homeDir: string): string {
	if (value === "~") return homeDir;
	return value.startsWith("~/") ? path.join(homeDir, value.slice(2)) : value;
}

function validateTools(
	value: unknown,
	defaults: ToolCommands,
): Validation<ToolCommands> {
	if (value === undefined) return Either.right(defaults);
	if (!isJSONObject(value)) return Either.left(`"tools" must be an object`);
	const overrides: Partial<Record<keyof ToolCommands, string>> = {};
	for (const key of TOOL_KEYS) {
		const entry = optionalString(value, key, `tools.${key}`);
		if (Either.isLeft(entry)) return Either.left(entry.left);
		if (entry.right !== undefined) overrides[key] = entry.right;
	}
	return Either.right({ ...defaults, ...overrides });
}

/**
 * Validate parsed JSON and merge it over the defaults.
 *
 * @pure true
 * @returns merged config or a message naming the offending key
 */
export function validateConfig(
	value: unknown,
	homeDir: string,
): Validation<SnapshotConfig> {
	const defaults = defaultConfig(homeDir);
	if (!isJSONObject(value)) return Either.left("top level must be an object");

	return Either.gen(function* () {
		const style = yield* optionalString(value, "style");
		const font = yield* optionalString(value, "font");
		const shotsDir = yield* optionalString(value, "shotsDir");
		const dpi = yield* optionalPositiveInt(value, "dpi");
		const width = yield* optionalPositiveInt(value, "width");
		const maxLines = yield* optionalPositiveInt(value, "maxLines");
		const renderLineLimit = yield* optionalPositiveInt(value, "renderLineLimit");
		const splitAt = value.splitAt;
		if (splitAt !== undefined && typeof splitAt !== "string") {
			return yield* Either.left(`"splitAt" must be a string`);
		}
		const clipboard = value.clipboard;
		if (clipboard !== undefined && !isClipboardBackend(clipboard)) {
			return yield* Either.left(
				`"clipboard" must be one of ${CLIPBOARD_BACKENDS.join(", ")}`,
			);
		}
		const tools = yield* validateTools(value.tools, defaults.tools);

		const config: SnapshotConfig = {
			style: style ?? defaults.style,
			font: font ?? defaults.font,
			shotsDir: shotsDir === undefined ? defaults.shotsDir : expandHome(shotsDir, homeDir),
			dpi: dpi ?? defaults.dpi,
			width: width ?? defaults.width,
			maxLines: maxLines ?? defaults.maxLines,
			renderLineLimit: renderLineLimit ?? defaults.renderLineLimit,
			splitAt: splitAt ?? defaults.splitAt,
			clipboard: clipboard ?? defaults.clipboard,
			tools,
		};
		return config;
	});
}

/**
 * Загружает конфигурацию из файла.
 *
 * @param explicitPath Путь из --config; отсутствие файла по этому пути считается ошибкой
 * @param cwd Каталог, в котором ищется codesnap.config.json
 * @param homeDir Домашний каталог пользователя
 */
export function loadConfig(
	explicitPath: string | null,
	cwd: string,
	homeDir: string,
): Effect.Effect<SnapshotConfig, ConfigError> {
	const configPath = explicitPath ?? path.join(cwd, DEFAULT_CONFIG_FILE);
	return Effect.gen(function* () {
		if (explicitPath === null && !fs.existsSync(configPath)) {
			return defaultConfig(homeDir);
		}
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const parsed = yield* Effect.try({
			try: (): unknown => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		const validated = validateConfig(parsed, homeDir);
		if (Either.isLeft(validated)) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: validated.left }),
			);
		}
		console.log(`⚙️  Loaded configuration from ${configPath}`);
		return validated.right;
	});
}
