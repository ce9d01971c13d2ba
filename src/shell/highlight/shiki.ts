// CHANGE: In-process highlighter backed by shiki TextMate grammars and VS Code themes
// WHY: Token colours must come from a real grammar; running it in process removes one
//      external program from the chain and gives typed tokens instead of escape codes
// SOURCE: https://shiki.style/guide/install#fine-grained-bundle
// PURITY: SHELL (loads grammars/themes asynchronously)
// EFFECT: Effect<StyledDocument, HighlightError>
// INVARIANT: document.lines.length = number of token lines produced by shiki
// COMPLEXITY: O(n) where n = |text|

import { Effect, Layer } from "effect";
import {
	type BundledLanguage,
	type BundledTheme,
	bundledLanguages,
	bundledThemes,
	createHighlighter,
	FontStyle,
	type ThemedToken,
	type ThemeRegistrationResolved,
} from "shiki";

import { HighlightError } from "../../core/errors.js";
import { normalizeColor } from "../../core/format/markup.js";
import { PLAIN_TEXT } from "../../core/language.js";
import type { StyledDocument, StyledLine } from "../../core/models.js";
import { Highlighter } from "../../core/services.js";

const FALLBACK_BACKGROUND = "#000000";
const FALLBACK_FOREGROUND = "#ffffff";

function isBundledLanguage(id: string): id is BundledLanguage {
	return Object.hasOwn(bundledLanguages, id);
}

function isBundledTheme(id: string): id is BundledTheme {
	return Object.hasOwn(bundledThemes, id);
}

/**
 * Foreground colour a theme gives to comments, used for line numbers and titles.
 *
 * @pure true
 */
export function commentColorOf(
	theme: Pick<ThemeRegistrationResolved, "settings" | "fg">,
): string {
	for (const setting of theme.settings) {
		const scopes =
			setting.scope === undefined
				? []
				: Array.isArray(setting.scope)
					? setting.scope
					: setting.scope.split(",");
		const isComment = scopes.some((s) => s.trim() === "comment");
		const color = normalizeColor(setting.settings.foreground);
		if (isComment && color !== null) return color;
	}
	return normalizeColor(theme.fg) ?? FALLBACK_FOREGROUND;
}

/**
 * Convert shiki tokens into the pipeline's styled lines.
 *
 * @pure true
 */
export function toStyledLines(
	tokens: readonly (readonly ThemedToken[])[],
): readonly StyledLine[] {
	return tokens.map((line) =>
		line.map((token) => {
			const style = token.fontStyle ?? FontStyle.None;
			return {
				text: token.content,
				color: normalizeColor(token.color),
				bold: style > 0 && (style & FontStyle.Bold) !== 0,
				italic: style > 0 && (style & FontStyle.Italic) !== 0,
				underline: style > 0 && (style & FontStyle.Underline) !== 0,
			};
		}),
	);
}

/**
 * Highlight `text` with a bundled grammar and theme.
 *
 * @pure false (dynamic grammar/theme imports)
 * @effect Effect<StyledDocument, HighlightError>
 */
export function highlightWithShiki(
	text: string,
	lang: string,
	theme: string,
): Effect.Effect<StyledDocument, HighlightError> {
	if (!isBundledTheme(theme)) {
		return Effect.fail(
			new HighlightError({ lang, theme, detail: "unknown theme" }),
		);
	}
	const themeId: BundledTheme = theme;
	let grammar: BundledLanguage | null = null;
	if (lang !== PLAIN_TEXT) {
		if (!isBundledLanguage(lang)) {
			return Effect.fail(
				new HighlightError({ lang, theme, detail: "unknown language" }),
			);
		}
		grammar = lang;
	}
	return Effect.tryPromise({
		try: async () => {
			const highlighter = await createHighlighter({
				themes: [themeId],
				langs: grammar === null ? [] : [grammar],
			});
			try {
				const result = highlighter.codeToTokens(text, {
					lang: grammar ?? PLAIN_TEXT,
					theme: themeId,
				});
				const resolved = highlighter.getTheme(themeId);
				return {
					lines: toStyledLines(result.tokens),
					background:
						normalizeColor(result.bg ?? resolved.bg) ?? FALLBACK_BACKGROUND,
					foreground:
						normalizeColor(result.fg ?? resolved.fg) ?? FALLBACK_FOREGROUND,
					commentColor: commentColorOf(resolved),
				};
			} finally {
				highlighter.dispose();
			}
		},
		catch: (error) =>
			new HighlightError({
				lang,
				theme,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

export const ShikiHighlighterLive = Layer.succeed(Highlighter, {
	supports: (lang) => lang === PLAIN_TEXT || isBundledLanguage(lang),
	highlight: highlightWithShiki,
});
