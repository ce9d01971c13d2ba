// CHANGE: PNG signature check for renderer output
// WHY: The renderer can exit 0 without writing an image; only the bytes tell the truth
// PURITY: CORE
// INVARIANT: isPng(b) → b.length > 8
// COMPLEXITY: O(1)

export const PNG_SIGNATURE: readonly number[] = [
	0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
];

/**
 * True when `bytes` start with the PNG signature and carry data after it.
 *
 * @pure true
 */
export function isPng(bytes: Uint8Array): boolean {
	if (bytes.length <= PNG_SIGNATURE.length) return false;
	return PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}
