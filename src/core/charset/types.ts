// CHANGE: Charset contract shared by the reader (decoding) and the shift state (encoding)
// PURITY: CORE
// INVARIANT: A decoder never returns Incomplete when `final` is true
// INVARIANT: encode() leaves the shift state untouched when it returns None
// COMPLEXITY: O(1) per character

import { Data, type Option } from "effect";

/**
 * Result of decoding at one byte offset.
 *
 * - `Decoded`: one character, `consumed` bytes long (shift bytes included)
 * - `Skip`: `consumed` bytes of shift sequence that yield no character
 * - `Invalid`: the byte at the offset starts no valid sequence
 * - `Incomplete`: a valid prefix runs into the end of the buffered bytes
 */
export type DecodeStep = Data.TaggedEnum<{
	Decoded: { readonly codepoint: number; readonly consumed: number };
	Skip: { readonly consumed: number };
	Invalid: {};
	Incomplete: {};
}>;

export const DecodeStep = Data.taggedEnum<DecodeStep>();

export const decoded = (codepoint: number, consumed: number): DecodeStep =>
	DecodeStep.Decoded({ codepoint, consumed });

export const skip = (consumed: number): DecodeStep => DecodeStep.Skip({ consumed });

export const INVALID: DecodeStep = DecodeStep.Invalid();

export const INCOMPLETE: DecodeStep = DecodeStep.Incomplete();

/**
 * Per-source decoding state.
 *
 * @precondition next(): offset < bytes.length
 */
export interface CharDecoder {
	next(bytes: Uint8Array, offset: number, final: boolean): DecodeStep;
	/** Return to the initial state, e.g. after a raw byte was taken. */
	reset(): void;
}

/**
 * Encoding state carried across writes.
 */
export interface CharEncoder {
	/** Bytes for one codepoint, or None when the charset cannot represent it. */
	encode(codepoint: number): Option.Option<Uint8Array>;
	/** Bytes returning to the initial shift state; empty when already there. */
	reset(): Uint8Array;
}

export interface Charset {
	readonly name: string;
	readonly aliases: readonly string[];
	createDecoder(): CharDecoder;
	createEncoder(): CharEncoder;
}

/**
 * Checks for a Unicode scalar value (no surrogates, at most U+10FFFF).
 *
 * @pure true
 */
export const isScalarValue = (value: number): boolean =>
	Number.isInteger(value) &&
	value >= 0 &&
	value <= 0x10ffff &&
	(value < 0xd800 || value > 0xdfff);

/**
 * Builds a charset whose decoding and encoding carry no state between characters.
 *
 * @pure true
 */
export function statelessCharset(spec: {
	readonly name: string;
	readonly aliases: readonly string[];
	readonly decode: (bytes: Uint8Array, offset: number, final: boolean) => DecodeStep;
	readonly encode: (codepoint: number) => Option.Option<Uint8Array>;
}): Charset {
	const empty = new Uint8Array(0);
	return {
		name: spec.name,
		aliases: spec.aliases,
		createDecoder: () => ({
			next: spec.decode,
			reset: () => undefined,
		}),
		createEncoder: () => ({
			encode: spec.encode,
			reset: () => empty,
		}),
	};
}
