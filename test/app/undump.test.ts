import { describe, expect, it } from "vitest";

import { undumpText } from "../../src/app/memory.js";
import { maxLineLength, runUndump } from "../../src/app/undump.js";
import { ascii as asciiCharset, utf7 } from "../../src/core/charset/index.js";
import { describeError } from "../../src/core/errors.js";
import { ascii, bytes, config, decode, environment, run } from "../utils/builders.js";

const HI = `00000000:     48    69    21${" ".repeat(35)}H i ! \n`;

const undump = (text: string, options: Parameters<typeof undumpText>[1] = {}): Uint8Array =>
	run(undumpText(text, options)).output;

describe("runUndump", () => {
	it("turns dump lines back into text", () => {
		expect(decode(undump(HI))).toBe("Hi!");
	});

	it("writes raw bytes verbatim", () => {
		expect(undump("00000000:    *FF     ÿ \n", { lineWidth: 1 })).toEqual(bytes(0xff));
	});

	it("ignores malformed lines", () => {
		expect(decode(undump(`garbage\n\n${HI}not a dump line\n`))).toBe("Hi!");
	});

	it("stops at the first line that reaches the limit and writes it in full", () => {
		const text = [
			"00000000:     61    62",
			"00000002:     63    64",
			"00000004:     65    66",
			"",
		].join("\n");
		expect(decode(undump(text, { lineWidth: 2, maxCharacters: 3 }))).toBe("abcd");
		expect(decode(undump(text, { lineWidth: 2, maxCharacters: 0 }))).toBe("");
	});

	it("substitutes characters the charset cannot encode", () => {
		expect(ascii(undump("0:     E9    41", { lineWidth: 2, charset: asciiCharset }))).toBe("?A");
	});

	it("finalizes the shift state once at the end of output", () => {
		const text = "00000000:     E9\n00000001:     41\n00000002:     E9\n";
		expect(ascii(undump(text, { lineWidth: 1, charset: utf7 }))).toBe("+AOk-A+AOk-");
	});

	it("resets the shift state before a raw byte", () => {
		const text = "00000000:     E9    *FF\n";
		expect([...undump(text, { lineWidth: 2, charset: utf7 })]).toEqual([
			0x2b, 0x41, 0x4f, 0x6b, 0x2d, 0xff,
		]);
	});

	it("reports a source whose text does not decode and carries on", () => {
		const env = environment({
			bad: bytes(0x30, 0x3a, 0x20, 0xff, 0x0a),
			good: "0:     4F    4B\n",
		});
		const result = run(runUndump(config({ direction: "undump", lineWidth: 2, sources: ["bad", "good"] }), env));
		expect(result.exitCode).toBe(1);
		expect(result.warnings.map(describeError)).toEqual([
			"bad: invalid or incomplete multibyte sequence at byte 3",
		]);
		expect(decode(env.output.contents())).toBe("OK");
	});

	it("bounds the line buffer by the line width", () => {
		expect(maxLineLength(8)).toBe(84);
		expect(maxLineLength(1)).toBe(28);
	});
});
