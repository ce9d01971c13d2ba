// CHANGE: Capability interfaces for the four pipeline stages as Effect services
// WHY: Stages are swapped for in-memory fakes in tests and for platform variants at runtime;
//      the OS clipboard in particular is injected rather than reached for directly
// SOURCE: https://effect.website/docs/requirements-management/services
// PURITY: CORE (interfaces only; implementations live in SHELL)
// INVARIANT: Each service exposes exactly one transform
// COMPLEXITY: O(1)

import { Context, type Effect } from "effect";

import type { ExternalToolError, HighlightError } from "./errors.js";
import type {
	HighlightedText,
	RenderedImage,
	RenderOptions,
	StyledDocument,
} from "./models.js";

/**
 * Source text → styled lines plus theme colours.
 */
export class Highlighter extends Context.Tag("codesnap/Highlighter")<
	Highlighter,
	{
		readonly supports: (lang: string) => boolean;
		readonly highlight: (
			text: string,
			lang: string,
			theme: string,
		) => Effect.Effect<StyledDocument, HighlightError>;
	}
>() {}

/**
 * ANSI-coloured terminal text → Pango markup.
 */
export class EscapeFilter extends Context.Tag("codesnap/EscapeFilter")<
	EscapeFilter,
	{
		readonly toMarkup: (
			text: string,
		) => Effect.Effect<HighlightedText, ExternalToolError>;
	}
>() {}

/**
 * Pango markup → PNG file at `outPath`.
 *
 * A zero exit status is not proof of an image: the bytes returned are
 * whatever the renderer left at `outPath` (possibly nothing) and the
 * pipeline validates them.
 */
export class Renderer extends Context.Tag("codesnap/Renderer")<
	Renderer,
	{
		readonly render: (
			text: HighlightedText,
			options: RenderOptions,
			outPath: string,
		) => Effect.Effect<RenderedImage, ExternalToolError>;
	}
>() {}

/**
 * Loads one image into the clipboard as image data.
 */
export class ClipboardWriter extends Context.Tag("codesnap/ClipboardWriter")<
	ClipboardWriter,
	{
		readonly write: (
			image: RenderedImage,
		) => Effect.Effect<void, ExternalToolError>;
	}
>() {}
