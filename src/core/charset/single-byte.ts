// CHANGE: Single-byte charsets where one byte is one character
// PURITY: CORE
// INVARIANT: Decoded.consumed = 1; encode(value) is Some ↔ value ≤ limit
// COMPLEXITY: O(1) per character

import { Option } from "effect";

import { type Charset, decoded, INVALID, statelessCharset } from "./types.js";

/**
 * Charset mapping bytes 0..limit to the identical codepoints.
 *
 * @pure true
 */
function identityCharset(
	name: string,
	aliases: readonly string[],
	limit: number,
): Charset {
	return statelessCharset({
		name,
		aliases,
		decode: (bytes, offset) => {
			const byte = bytes[offset];
			return byte !== undefined && byte <= limit ? decoded(byte, 1) : INVALID;
		},
		encode: (value) =>
			Number.isInteger(value) && value >= 0 && value <= limit
				? Option.some(Uint8Array.of(value))
				: Option.none(),
	});
}

export const latin1 = identityCharset(
	"iso-8859-1",
	["iso88591", "latin1", "l1", "cp819"],
	0xff,
);

export const ascii = identityCharset(
	"us-ascii",
	["usascii", "ascii", "ansix3.41968", "646"],
	0x7f,
);
