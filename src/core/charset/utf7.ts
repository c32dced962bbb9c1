// CHANGE: UTF-7 (RFC 2152), the stateful charset: base64 runs of UTF-16 between "+" and "-"
// PURITY: CORE (decoder/encoder objects own mutable shift state, no I/O)
// INVARIANT: The encoder always closes a base64 run with "-" before any direct byte
// INVARIANT: Decoder state is committed only when a whole character was read
// INVARIANT: A run that fails before its first character is Invalid at its "+"
// COMPLEXITY: O(1) amortized per character

import { Option } from "effect";

import {
	type CharDecoder,
	type CharEncoder,
	type Charset,
	type DecodeStep,
	decoded,
	INCOMPLETE,
	INVALID,
	isScalarValue,
	skip,
} from "./types.js";

const PLUS = 0x2b;
const MINUS = 0x2d;

const ALPHABET =
	"ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

const BASE64_VALUES: readonly number[] = Array.from({ length: 128 }, (_, byte) =>
	ALPHABET.indexOf(String.fromCharCode(byte)),
);

/** RFC 2152 set D plus space, tab, CR and LF. */
const DIRECT_CHARACTERS = new Set(
	Array.from(
		"ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'(),-./:? \t\r\n",
		(ch) => ch.charCodeAt(0),
	),
);

/**
 * Base64 digit value of a byte, or -1.
 *
 * @pure true
 */
export const base64Value = (byte: number): number =>
	byte < 0x80 ? (BASE64_VALUES[byte] ?? -1) : -1;

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff;

function utf16Units(value: number): readonly number[] {
	if (value < 0x10000) return [value];
	const offset = value - 0x10000;
	return [0xd800 | (offset >> 10), 0xdc00 | (offset & 0x3ff)];
}

class Utf7Decoder implements CharDecoder {
	private shifted = false;
	private bits = 0;
	private bitCount = 0;

	next(bytes: Uint8Array, offset: number, final: boolean): DecodeStep {
		return this.shifted
			? this.nextShifted(bytes, offset, final)
			: this.nextDirect(bytes, offset, final);
	}

	reset(): void {
		this.shifted = false;
		this.bits = 0;
		this.bitCount = 0;
	}

	private nextDirect(bytes: Uint8Array, offset: number, final: boolean): DecodeStep {
		const byte = bytes[offset];
		if (byte === undefined || byte >= 0x80) return INVALID;
		if (byte !== PLUS) return decoded(byte, 1);

		const following = bytes[offset + 1];
		if (following === undefined) return final ? INVALID : INCOMPLETE;
		if (following === MINUS) return decoded(PLUS, 2);
		if (base64Value(following) < 0) return INVALID;
		// the "+" is committed together with the run's first character
		this.shifted = true;
		this.bits = 0;
		this.bitCount = 0;
		const first = this.nextShifted(bytes, offset + 1, final);
		if (first._tag === "Decoded") return decoded(first.codepoint, first.consumed + 1);
		this.reset();
		return first._tag === "Incomplete" ? INCOMPLETE : INVALID;
	}

	private nextShifted(bytes: Uint8Array, offset: number, final: boolean): DecodeStep {
		let bits = this.bits;
		let bitCount = this.bitCount;
		let high = -1;
		for (let index = offset; ; ) {
			const byte = bytes[index];
			if (byte === undefined) return final ? INVALID : INCOMPLETE;
			const value = base64Value(byte);
			if (value < 0) {
				if (index > offset) return INVALID;
				// run terminator; an explicit "-" belongs to the run
				this.reset();
				return byte === MINUS ? skip(1) : this.nextDirect(bytes, offset, final);
			}
			bits = (bits << 6) | value;
			bitCount += 6;
			index += 1;
			if (bitCount < 16) continue;

			bitCount -= 16;
			const unit = (bits >> bitCount) & 0xffff;
			bits &= (1 << bitCount) - 1;
			if (isHighSurrogate(unit)) {
				if (high >= 0) return INVALID;
				high = unit;
				continue;
			}
			if (isLowSurrogate(unit) !== (high >= 0)) return INVALID;
			this.bits = bits;
			this.bitCount = bitCount;
			const value32 =
				high >= 0 ? 0x10000 + ((high - 0xd800) << 10) + (unit - 0xdc00) : unit;
			return decoded(value32, index - offset);
		}
	}
}

class Utf7Encoder implements CharEncoder {
	private shifted = false;
	private bits = 0;
	private bitCount = 0;

	encode(value: number): Option.Option<Uint8Array> {
		if (!isScalarValue(value)) return Option.none();
		const out: number[] = [];
		if (value === PLUS || DIRECT_CHARACTERS.has(value)) {
			this.closeRun(out);
			if (value === PLUS) out.push(PLUS, MINUS);
			else out.push(value);
			return Option.some(Uint8Array.from(out));
		}
		if (!this.shifted) {
			out.push(PLUS);
			this.shifted = true;
		}
		for (const unit of utf16Units(value)) this.pushUnit(unit, out);
		return Option.some(Uint8Array.from(out));
	}

	reset(): Uint8Array {
		const out: number[] = [];
		this.closeRun(out);
		return Uint8Array.from(out);
	}

	private pushUnit(unit: number, out: number[]): void {
		this.bits = (this.bits << 16) | unit;
		this.bitCount += 16;
		while (this.bitCount >= 6) {
			this.bitCount -= 6;
			out.push(ALPHABET.charCodeAt((this.bits >> this.bitCount) & 0x3f));
		}
		this.bits &= (1 << this.bitCount) - 1;
	}

	private closeRun(out: number[]): void {
		if (!this.shifted) return;
		if (this.bitCount > 0) {
			out.push(ALPHABET.charCodeAt((this.bits << (6 - this.bitCount)) & 0x3f));
		}
		out.push(MINUS);
		this.shifted = false;
		this.bits = 0;
		this.bitCount = 0;
	}
}

export const utf7: Charset = {
	name: "utf-7",
	aliases: ["utf7", "unicode11utf7"],
	createDecoder: () => new Utf7Decoder(),
	createEncoder: () => new Utf7Encoder(),
};
