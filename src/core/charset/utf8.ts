// CHANGE: UTF-8 charset with strict well-formedness (RFC 3629)
// PURITY: CORE
// INVARIANT: Overlong forms, surrogates and values above U+10FFFF are Invalid
// INVARIANT: A truncated sequence is Incomplete while more input may follow, Invalid at the end
// COMPLEXITY: O(1) per character

import { Option } from "effect";

import {
	type DecodeStep,
	decoded,
	INCOMPLETE,
	INVALID,
	isScalarValue,
	statelessCharset,
} from "./types.js";

/**
 * Sequence length announced by a lead byte; 0 when the byte cannot lead.
 *
 * @pure true
 */
function sequenceLength(lead: number): number {
	if (lead < 0x80) return 1;
	if (lead < 0xc2) return 0;
	if (lead < 0xe0) return 2;
	if (lead < 0xf0) return 3;
	if (lead < 0xf5) return 4;
	return 0;
}

/**
 * Allowed range of the second byte; narrower than 80..BF after E0, ED, F0 and F4.
 *
 * @pure true
 */
function secondByteRange(lead: number): readonly [number, number] {
	switch (lead) {
		case 0xe0:
			return [0xa0, 0xbf];
		case 0xed:
			return [0x80, 0x9f];
		case 0xf0:
			return [0x90, 0xbf];
		case 0xf4:
			return [0x80, 0x8f];
		default:
			return [0x80, 0xbf];
	}
}

function decodeUtf8(bytes: Uint8Array, offset: number, final: boolean): DecodeStep {
	const lead = bytes[offset];
	if (lead === undefined) return final ? INVALID : INCOMPLETE;
	const length = sequenceLength(lead);
	if (length === 0) return INVALID;
	if (length === 1) return decoded(lead, 1);

	let value = lead & (0xff >> (length + 1));
	for (let index = 1; index < length; index += 1) {
		const byte = bytes[offset + index];
		if (byte === undefined) return final ? INVALID : INCOMPLETE;
		const [low, high] = index === 1 ? secondByteRange(lead) : [0x80, 0xbf];
		if (byte < low || byte > high) return INVALID;
		value = (value << 6) | (byte & 0x3f);
	}
	return decoded(value, length);
}

/**
 * UTF-8 bytes of a scalar value.
 *
 * @pure true
 * @postcondition isScalarValue(value) ↔ result is Some
 */
export function encodeUtf8(value: number): Option.Option<Uint8Array> {
	if (!isScalarValue(value)) return Option.none();
	if (value < 0x80) return Option.some(Uint8Array.of(value));
	if (value < 0x800) {
		return Option.some(Uint8Array.of(0xc0 | (value >> 6), 0x80 | (value & 0x3f)));
	}
	if (value < 0x10000) {
		return Option.some(
			Uint8Array.of(
				0xe0 | (value >> 12),
				0x80 | ((value >> 6) & 0x3f),
				0x80 | (value & 0x3f),
			),
		);
	}
	return Option.some(
		Uint8Array.of(
			0xf0 | (value >> 18),
			0x80 | ((value >> 12) & 0x3f),
			0x80 | ((value >> 6) & 0x3f),
			0x80 | (value & 0x3f),
		),
	);
}

export const utf8 = statelessCharset({
	name: "utf-8",
	aliases: ["utf8"],
	decode: decodeUtf8,
	encode: encodeUtf8,
});
