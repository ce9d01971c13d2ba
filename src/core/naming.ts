// CHANGE: Pure naming of saved images
// WHY: Output paths must be predictable so scripts can pick the files up
// PURITY: CORE
// INVARIANT: result.length = count ∧ all paths distinct
// COMPLEXITY: O(count)

/**
 * Paths for `count` images saved under `base`.
 *
 * A single image with a `.png` base is written exactly there; otherwise
 * images are numbered from 1 after the base with `.png` removed.
 *
 * @pure true
 *
 * @example
 * ```ts
 * outputPaths("shot.png", 1); // ["shot.png"]
 * outputPaths("shot.png", 2); // ["shot-1.png", "shot-2.png"]
 * outputPaths("shot", 1);     // ["shot-1.png"]
 * ```
 */
export function outputPaths(base: string, count: number): readonly string[] {
	const isPngBase = /\.png$/i.test(base);
	if (count === 1 && isPngBase) return [base];
	const stem = isPngBase ? base.slice(0, -4) : base;
	return Array.from({ length: count }, (_, i) => `${stem}-${i + 1}.png`);
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

/**
 * Local-time stamp `YYYYMMDD-HHMMSS` used for screenshot names.
 *
 * @pure true
 */
export function shotStamp(date: Date): string {
	const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
	const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
	return `${day}-${time}`;
}

/**
 * Base path for screenshots in `dir` taken at `date`.
 *
 * @pure true
 */
export function shotBase(dir: string, date: Date): string {
	return `${dir.replace(/\/+$/, "")}/screenshot-${shotStamp(date)}`;
}
