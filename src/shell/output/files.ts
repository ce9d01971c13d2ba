// CHANGE: Save rendered images to disk instead of the clipboard
// WHY: Split sources produce several images; files (or the shots folder) hold all of them
// PURITY: SHELL (filesystem)
// EFFECT: Effect<readonly string[], OutputError>

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { OutputError } from "../../core/errors.js";
import type { RenderedImage } from "../../core/models.js";

/**
 * True when `dir` exists and is a directory.
 *
 * @pure false (reads filesystem)
 */
export function isDirectory(dir: string): boolean {
	try {
		return fs.statSync(dir).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Write `images[i]` to `targets[i]`, creating parent directories.
 *
 * @precondition images.length === targets.length
 * @returns written paths in order
 */
export function writeImages(
	images: readonly RenderedImage[],
	targets: readonly string[],
): Effect.Effect<readonly string[], OutputError> {
	return Effect.forEach(images, (image, i) => {
		const target = targets[i] ?? `${image.path}.png`;
		return Effect.try({
			try: () => {
				fs.mkdirSync(path.dirname(path.resolve(target)), { recursive: true });
				fs.writeFileSync(target, image.bytes);
				console.log(`💾 Saved ${target}`);
				return target;
			},
			catch: (error) =>
				new OutputError({
					path: target,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
	});
}
