// PURITY: CORE
// COMPLEXITY: O(n) where n = total bytes

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

/**
 * Concatenates byte chunks into one array.
 *
 * @pure true
 * @postcondition result.length = Σ chunks[i].length
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
	if (chunks.length === 0) return EMPTY_BYTES;
	let total = 0;
	for (const chunk of chunks) total += chunk.length;
	const result = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}
	return result;
}
