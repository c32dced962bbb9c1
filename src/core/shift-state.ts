// CHANGE: Explicit encoder shift state owned by one run and threaded through every write
// PURITY: CORE (mutable state object, no I/O)
// INVARIANT: After encodeRawByte or finalize the encoder is in its initial shift state
// INVARIANT: finalize() twice in a row yields empty bytes the second time
// COMPLEXITY: O(n) where n = bytes produced

import { Option, pipe } from "effect";

import { concatBytes, EMPTY_BYTES } from "./bytes.js";
import type { CharEncoder, Charset } from "./charset/types.js";

export const REPLACEMENT_CHARACTER = 0xfffd;

/** Last resort when the charset cannot even encode U+FFFD. */
export const SUBSTITUTE_CHARACTER = 0x3f;

export class ShiftState {
	private readonly encoder: CharEncoder;

	constructor(readonly charset: Charset) {
		this.encoder = charset.createEncoder();
	}

	/**
	 * Bytes for a codepoint; unencodable values become U+FFFD, or "?" when that fails too.
	 *
	 * @postcondition result.length > 0 for every charset that encodes "?"
	 */
	encodeCodepoint(value: number): Uint8Array {
		return pipe(
			this.encoder.encode(value),
			Option.orElse(() => this.encoder.encode(REPLACEMENT_CHARACTER)),
			Option.orElse(() => this.encoder.encode(SUBSTITUTE_CHARACTER)),
			Option.getOrElse(() => EMPTY_BYTES),
		);
	}

	/**
	 * Returns to the initial shift state, then emits the byte verbatim.
	 * A run the input ended implicitly comes back closed ("+AOk\x80" → "+AOk-\x80").
	 *
	 * @precondition 0 ≤ byte ≤ 0xFF
	 */
	encodeRawByte(byte: number): Uint8Array {
		const reset = this.encoder.reset();
		const out = new Uint8Array(reset.length + 1);
		out.set(reset, 0);
		out[reset.length] = byte & 0xff;
		return out;
	}

	/** Encodes a whole string, one codepoint at a time. */
	encodeText(text: string): Uint8Array {
		const chunks: Uint8Array[] = [];
		for (const ch of text) {
			chunks.push(this.encodeCodepoint(ch.codePointAt(0) ?? SUBSTITUTE_CHARACTER));
		}
		return concatBytes(chunks);
	}

	/** Reset sequence that ends the output in the initial shift state. */
	finalize(): Uint8Array {
		return this.encoder.reset();
	}
}
