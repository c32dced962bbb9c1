import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { dumpBytes, undumpText } from "../../src/app/memory.js";
import type { Charset } from "../../src/core/charset/index.js";
import { ascii as asciiCharset, latin1, utf7, utf8 } from "../../src/core/charset/index.js";
import { concatBytes } from "../../src/core/bytes.js";
import { type CharacterUnit, codepoint, rawByte } from "../../src/core/character.js";
import { encodeUnit } from "../../src/core/dump/parse.js";
import { ShiftState } from "../../src/core/shift-state.js";
import { ascii, bytes, encode, run } from "../utils/builders.js";

const roundTrip = (
	input: Uint8Array,
	charset: Charset,
	lineWidth: number,
	tolerateBadBytes = false,
): Uint8Array => {
	const dumped = run(dumpBytes(input, { charset, lineWidth, tolerateBadBytes })).output;
	return run(undumpText(dumped, { charset, lineWidth })).output;
};

const scalar = fc.oneof(
	fc.integer({ min: 0x00, max: 0x7f }),
	fc.integer({ min: 0x80, max: 0xd7ff }),
	fc.integer({ min: 0xe000, max: 0x10ffff }),
);

const utf8Text = fc
	.array(scalar, { maxLength: 50 })
	.map((codepoints) => new TextEncoder().encode(String.fromCodePoint(...codepoints)));

describe("dump then undump", () => {
	it("restores valid UTF-8 byte for byte", () => {
		fc.assert(
			fc.property(utf8Text, fc.integer({ min: 1, max: 20 }), (input, lineWidth) => {
				expect(roundTrip(input, utf8, lineWidth)).toEqual(input);
			}),
		);
	});

	it("restores any byte sequence as ISO-8859-1", () => {
		fc.assert(
			fc.property(fc.uint8Array({ maxLength: 60 }), fc.integer({ min: 1, max: 20 }), (input, lineWidth) => {
				expect(roundTrip(input, latin1, lineWidth)).toEqual(input);
			}),
		);
	});

	it("restores arbitrary bytes as UTF-8 or US-ASCII when invalid bytes are tolerated", () => {
		fc.assert(
			fc.property(
				fc.uint8Array({ maxLength: 60 }),
				fc.integer({ min: 1, max: 12 }),
				fc.constantFrom(utf8, asciiCharset),
				(input, lineWidth, charset) => {
					expect(roundTrip(input, charset, lineWidth, true)).toEqual(input);
				},
			),
		);
	});

	it("restores the UTF-7 encoder's own output", () => {
		fc.assert(
			fc.property(
				fc.array(scalar, { maxLength: 30 }),
				fc.integer({ min: 1, max: 10 }),
				(codepoints, lineWidth) => {
					const state = new ShiftState(utf7);
					const text = String.fromCodePoint(...codepoints);
					const input = Uint8Array.from([...state.encodeText(text), ...state.finalize()]);
					expect(roundTrip(input, utf7, lineWidth)).toEqual(input);
				},
			),
		);
	});

	it("keeps an invalid 0xFF a raw byte rather than U+00FF", () => {
		const input = Uint8Array.of(0x61, 0xff, 0x62);
		expect(roundTrip(input, utf8, 8, true)).toEqual(input);
	});
});

const highByte = fc.integer({ min: 0x80, max: 0xff });

/** Encoder output for a unit sequence, raw bytes inserted through the shift state. */
const encodeUtf7Units = (units: readonly CharacterUnit[]): Uint8Array => {
	const state = new ShiftState(utf7);
	const body = units.map((unit) => encodeUnit(unit, state));
	return concatBytes([...body, state.finalize()]);
};

const utf7Text = fc
	.array(scalar, { maxLength: 12 })
	.map((codepoints) => encodeUtf7Units(codepoints.map(codepoint)));

describe("dump then undump with raw bytes under UTF-7", () => {
	it("restores raw bytes placed between characters in any shift state", () => {
		const unit = fc.oneof(scalar.map(codepoint), highByte.map(rawByte));
		fc.assert(
			fc.property(fc.array(unit, { maxLength: 30 }), fc.integer({ min: 1, max: 10 }), (units, lineWidth) => {
				const input = encodeUtf7Units(units);
				expect(roundTrip(input, utf7, lineWidth, true)).toEqual(input);
			}),
		);
	});

	it("keeps the '+' of a run that breaks before its first character", () => {
		const digits = fc.array(fc.constantFrom(..."AOkZa09"), { maxLength: 2 });
		fc.assert(
			fc.property(utf7Text, digits, highByte, utf7Text, (before, opened, high, after) => {
				const input = concatBytes([before, encode(`+${opened.join("")}`), bytes(high), after]);
				expect(roundTrip(input, utf7, 4, true)).toEqual(input);
			}),
		);
	});

	it("keeps every high byte, in order, wherever it is spliced", () => {
		fc.assert(
			fc.property(utf7Text, fc.nat(), highByte, (text, at, high) => {
				const cut = at % (text.length + 1);
				const input = concatBytes([text.subarray(0, cut), bytes(high), text.subarray(cut)]);
				const output = roundTrip(input, utf7, 3, true);
				const highBytes = (data: Uint8Array): number[] => [...data].filter((b) => b >= 0x80);
				expect(highBytes(output)).toEqual(highBytes(input));
			}),
		);
	});

	it("restores a byte spliced right after '+' or before a run's first character", () => {
		expect(ascii(roundTrip(bytes(0x2b, 0x80), utf7, 8, true))).toBe("+\x80");
		expect(ascii(roundTrip(bytes(0x2b, 0x41, 0x4f, 0x80), utf7, 8, true))).toBe("+AO\x80");
	});

	it("closes a run with '-' before a byte spliced after one of its characters", () => {
		expect(ascii(roundTrip(bytes(0x2b, 0x41, 0x4f, 0x6b, 0x80), utf7, 8, true))).toBe("+AOk-\x80");
		const twice = bytes(0x2b, 0x41, 0x4f, 0x6b, 0x41, 0x80, 0x36, 0x51, 0x2d);
		expect(ascii(roundTrip(twice, utf7, 8, true))).toBe("+AOk-A\x806Q-");
	});
});
