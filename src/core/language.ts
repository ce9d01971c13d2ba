// CHANGE: Pure language resolution from explicit flag, file name or extension
// WHY: The highlighter needs a grammar id; guessing must never abort a snapshot
// PURITY: CORE
// INVARIANT: result.lang is either a supported id or "text"
// COMPLEXITY: O(1)

import { match, P } from "ts-pattern";

export const PLAIN_TEXT = "text";

// Names and extensions the highlighter does not know under the same key.
const FILE_NAMES: Readonly<Record<string, string>> = {
	dockerfile: "docker",
	makefile: "make",
	gnumakefile: "make",
	"cmakelists.txt": "cmake",
	jenkinsfile: "groovy",
	gemfile: "ruby",
	rakefile: "ruby",
	".bashrc": "bash",
	".zshrc": "zsh",
	".gitignore": "shellscript",
};

const EXTENSIONS: Readonly<Record<string, string>> = {
	h: "c",
	hh: "cpp",
	hpp: "cpp",
	cc: "cpp",
	cxx: "cpp",
	mjs: "javascript",
	cjs: "javascript",
	mts: "typescript",
	cts: "typescript",
	pyw: "python",
	pyi: "python",
	zsh: "shellscript",
	sh: "shellscript",
	bash: "shellscript",
	htm: "html",
	yml: "yaml",
	mk: "make",
	el: "emacs-lisp",
	txt: PLAIN_TEXT,
};

export interface LanguageChoice {
	readonly lang: string;
	/** Requested or inferred id that was not supported, if any. */
	readonly unsupported: string | null;
}

function baseName(filePath: string): string {
	const parts = filePath.split(/[\\/]/);
	return parts.at(-1) ?? filePath;
}

/**
 * Infer a language id from a file path.
 *
 * @returns candidate id (not yet checked for support) or null
 * @pure true
 */
export function inferFromPath(filePath: string): string | null {
	const name = baseName(filePath).toLowerCase();
	const byName = FILE_NAMES[name];
	if (byName !== undefined) return byName;
	const dot = name.lastIndexOf(".");
	if (dot <= 0 || dot === name.length - 1) return null;
	const ext = name.slice(dot + 1);
	return EXTENSIONS[ext] ?? ext;
}

/**
 * Resolve the grammar to highlight with.
 *
 * Priority: explicit `lang` → file name → extension → plain text.
 *
 * @param isSupported - highlighter's knowledge of language ids and aliases
 * @pure true (given a pure `isSupported`)
 *
 * @example
 * ```ts
 * resolveLanguage({ lang: null, path: "src/app.ts" }, (id) => id === "ts");
 * // { lang: "ts", unsupported: null }
 * ```
 */
export function resolveLanguage(
	input: { readonly lang: string | null; readonly path: string | null },
	isSupported: (id: string) => boolean,
): LanguageChoice {
	const candidate = match(input)
		.with({ lang: P.string }, ({ lang }) => lang.toLowerCase())
		.with({ path: P.string }, ({ path }) => inferFromPath(path))
		.otherwise(() => null);

	if (candidate === null || candidate === PLAIN_TEXT) {
		return { lang: PLAIN_TEXT, unsupported: null };
	}
	return isSupported(candidate)
		? { lang: candidate, unsupported: null }
		: { lang: PLAIN_TEXT, unsupported: candidate };
}
