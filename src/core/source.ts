// CHANGE: Pure normalisation of source text before highlighting
// WHY: A trailing newline would render as an extra numbered empty line; CRLF would
//      leave carriage returns inside the markup
// PURITY: CORE
// INVARIANT: result contains no "\r\n" and does not end with "\n"

/**
 * @param fromStdin - piped text also loses trailing blank lines and spaces
 * @pure true
 *
 * @example
 * ```ts
 * normalizeSourceText("a\r\nb\n", false); // "a\nb"
 * normalizeSourceText("a\n\n  ", true);   // "a"
 * ```
 */
export function normalizeSourceText(text: string, fromStdin: boolean): string {
	const lf = text.replace(/\r\n/g, "\n");
	if (fromStdin) return lf.trimEnd();
	return lf.endsWith("\n") ? lf.slice(0, -1) : lf;
}
