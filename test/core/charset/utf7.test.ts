import { describe, expect, it } from "vitest";

import { type DecodeStep, decoded, INCOMPLETE, INVALID } from "../../../src/core/charset/types.js";
import { base64Value, utf7 } from "../../../src/core/charset/utf7.js";
import { ShiftState } from "../../../src/core/shift-state.js";
import { ascii, bytes, encode } from "../../utils/builders.js";

/** Decodes a whole buffer, collecting codepoints, or "!" at the first invalid byte. */
function decodeAll(text: string): Array<number | "!"> {
	const data = encode(text);
	const decoder = utf7.createDecoder();
	const out: Array<number | "!"> = [];
	let offset = 0;
	while (offset < data.length) {
		const step: DecodeStep = decoder.next(data, offset, true);
		switch (step._tag) {
			case "Decoded":
				out.push(step.codepoint);
				offset += step.consumed;
				break;
			case "Skip":
				offset += step.consumed;
				break;
			default:
				out.push("!");
				return out;
		}
	}
	return out;
}

const encodeWith = (text: string): string => {
	const state = new ShiftState(utf7);
	const body = state.encodeText(text);
	return ascii(body) + ascii(state.finalize());
};

describe("utf7 encoder", () => {
	it("writes set D, whitespace and '+' directly", () => {
		expect(encodeWith("Hi there.")).toBe("Hi there.");
		expect(encodeWith("a+b")).toBe("a+-b");
	});

	it("writes other characters in base64 runs closed with '-'", () => {
		expect(encodeWith("é.")).toBe("+AOk-.");
		expect(encodeWith("€")).toBe("+IKw-");
		expect(encodeWith("😀")).toBe("+2D3eAA-");
	});

	it("keeps one run open across consecutive shifted characters", () => {
		expect(encodeWith("éé")).toBe("+AOkA6Q-");
	});

	it("closes the run only on reset and emits nothing when already closed", () => {
		const state = new ShiftState(utf7);
		expect(ascii(state.encodeCodepoint(0xe9))).toBe("+AO");
		expect(ascii(state.finalize())).toBe("k-");
		expect(ascii(state.finalize())).toBe("");
	});
});

describe("utf7 decoder", () => {
	it("decodes direct characters and '+-'", () => {
		expect(decodeAll("a+-b")).toEqual([0x61, 0x2b, 0x62]);
	});

	it("decodes base64 runs and absorbs the closing '-'", () => {
		expect(decodeAll("+AOk-.")).toEqual([0xe9, 0x2e]);
		expect(decodeAll("+AOkA6Q-")).toEqual([0xe9, 0xe9]);
		expect(decodeAll("+2D3eAA-")).toEqual([0x1f600]);
	});

	it("ends a run at any non-base64 byte", () => {
		expect(decodeAll("+AOk.")).toEqual([0xe9, 0x2e]);
	});

	it("rejects an unpaired surrogate", () => {
		expect(decodeAll("+3gA-")).toEqual(["!"]);
	});

	it("rejects a run cut inside a UTF-16 unit", () => {
		expect(decodeAll("+AO-")).toEqual(["!"]);
	});

	it("counts the opening '+' in the first character of a run", () => {
		expect(utf7.createDecoder().next(encode("+AOk-"), 0, true)).toEqual(decoded(0xe9, 4));
	});

	it("reports a run that breaks before its first character at the '+'", () => {
		const decoder = utf7.createDecoder();
		expect(decoder.next(bytes(0x2b, 0x41, 0x4f, 0x80), 0, true)).toEqual(INVALID);
		expect(decoder.next(bytes(0x41, 0x80), 0, true)).toEqual(decoded(0x41, 1));
	});

	it("leaves the '+' uncommitted while the first character is still arriving", () => {
		const decoder = utf7.createDecoder();
		expect(decoder.next(encode("+AO"), 0, false)).toEqual(INCOMPLETE);
		expect(decoder.next(encode("+AOk"), 0, false)).toEqual(decoded(0xe9, 4));
	});

	it("rejects bytes with the high bit set", () => {
		expect(decodeAll("é")).toEqual(["!"]);
	});

	it("round-trips its own output", () => {
		const text = "x + y = 2€, 😀 ok";
		const decoded = decodeAll(encodeWith(text));
		expect(String.fromCodePoint(...decoded.filter((v) => v !== "!"))).toBe(text);
		expect(decoded).not.toContain("!");
	});
});

describe("base64Value", () => {
	it("maps the RFC 2045 alphabet and rejects the rest", () => {
		expect(base64Value(0x41)).toBe(0);
		expect(base64Value(0x2f)).toBe(63);
		expect(base64Value(0x2d)).toBe(-1);
		expect(base64Value(0xc3)).toBe(-1);
	});
});
