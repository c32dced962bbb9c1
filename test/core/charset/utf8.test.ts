import { Option } from "effect";
import { describe, expect, it } from "vitest";

import { encodeUtf8, utf8 } from "../../../src/core/charset/utf8.js";
import { DecodeStep } from "../../../src/core/charset/types.js";
import { bytes } from "../../utils/builders.js";

const step = (data: Uint8Array, final = true, offset = 0): DecodeStep =>
	utf8.createDecoder().next(data, offset, final);

describe("utf8 decoder", () => {
	it("decodes one to four byte sequences", () => {
		expect(step(bytes(0x41))).toEqual(DecodeStep.Decoded({ codepoint: 0x41, consumed: 1 }));
		expect(step(bytes(0xc3, 0xa9))).toEqual(
			DecodeStep.Decoded({ codepoint: 0xe9, consumed: 2 }),
		);
		expect(step(bytes(0xe4, 0xb8, 0xad))).toEqual(
			DecodeStep.Decoded({ codepoint: 0x4e2d, consumed: 3 }),
		);
		expect(step(bytes(0xf0, 0x9f, 0x98, 0x80))).toEqual(
			DecodeStep.Decoded({ codepoint: 0x1f600, consumed: 4 }),
		);
	});

	it("decodes at the given offset", () => {
		expect(step(bytes(0x41, 0xc3, 0xa9), true, 1)).toEqual(
			DecodeStep.Decoded({ codepoint: 0xe9, consumed: 2 }),
		);
	});

	it("rejects continuation bytes, overlongs, surrogates and values past U+10FFFF", () => {
		expect(step(bytes(0x80))._tag).toBe("Invalid");
		expect(step(bytes(0xff))._tag).toBe("Invalid");
		expect(step(bytes(0xc0, 0x80))._tag).toBe("Invalid");
		expect(step(bytes(0xe0, 0x80, 0x80))._tag).toBe("Invalid");
		expect(step(bytes(0xed, 0xa0, 0x80))._tag).toBe("Invalid");
		expect(step(bytes(0xf4, 0x90, 0x80, 0x80))._tag).toBe("Invalid");
		expect(step(bytes(0xf5, 0x80, 0x80, 0x80))._tag).toBe("Invalid");
	});

	it("reports a truncated sequence as incomplete until the input is final", () => {
		expect(step(bytes(0xe4, 0xb8), false)._tag).toBe("Incomplete");
		expect(step(bytes(0xe4, 0xb8), true)._tag).toBe("Invalid");
	});

	it("rejects a lead byte followed by a non-continuation byte", () => {
		expect(step(bytes(0xc3, 0x41))._tag).toBe("Invalid");
	});
});

describe("encodeUtf8", () => {
	it("encodes scalar values", () => {
		expect(Option.getOrThrow(encodeUtf8(0x24))).toEqual(bytes(0x24));
		expect(Option.getOrThrow(encodeUtf8(0xe9))).toEqual(bytes(0xc3, 0xa9));
		expect(Option.getOrThrow(encodeUtf8(0x20ac))).toEqual(bytes(0xe2, 0x82, 0xac));
		expect(Option.getOrThrow(encodeUtf8(0x1f600))).toEqual(
			bytes(0xf0, 0x9f, 0x98, 0x80),
		);
	});

	it("refuses surrogates and out-of-range values", () => {
		expect(Option.isNone(encodeUtf8(0xd800))).toBe(true);
		expect(Option.isNone(encodeUtf8(0x110000))).toBe(true);
		expect(Option.isNone(encodeUtf8(-1))).toBe(true);
	});

	it("has a stateless encoder whose reset is empty", () => {
		expect(utf8.createEncoder().reset()).toEqual(new Uint8Array(0));
	});
});
