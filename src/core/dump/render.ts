// CHANGE: Renderer for one dump line: address, fixed 6-column fields, aligned glyph section
// PURITY: CORE
// INVARIANT: ∀ k ≤ lineWidth: the glyph section starts at column glyphColumn(lineWidth)
// COMPLEXITY: O(k) per line where k = |units|

import { match } from "ts-pattern";

import type { CharacterUnit } from "../character.js";
import { REPLACEMENT_CHARACTER } from "../shift-state.js";
import { displayWidth } from "./width.js";

export const ADDRESS_DIGITS = 8;
export const FIELD_WIDTH = 6;
export const GLYPH_GAP = 5;

/** First codepoint of the Unicode "Control Pictures" block (␀). */
export const CONTROL_PICTURES = 0x2400;

const hex = (value: number, digits: number, fill = "0"): string =>
	value.toString(16).toUpperCase().padStart(digits, fill);

/**
 * Column at which glyphs start: address, ": ", every field slot, then the gap.
 *
 * @pure true
 */
export const glyphColumn = (lineWidth: number): number =>
	ADDRESS_DIGITS + 2 + FIELD_WIDTH * lineWidth + GLYPH_GAP;

/**
 * Address field: at least 8 uppercase hex digits.
 *
 * @pure true
 */
export const renderAddress = (position: number): string =>
	hex(position, ADDRESS_DIGITS);

/**
 * One 6-column field.
 *
 * @pure true
 * @example
 * ```ts
 * renderField(codepoint(0x48));    // "    48"
 * renderField(rawByte(0xff));      // "   *FF"
 * renderField(codepoint(0x1f600)); // " 1F600"
 * ```
 */
export const renderField = (unit: CharacterUnit): string =>
	match(unit)
		.with({ _tag: "RawByte" }, ({ value }) => `   *${hex(value, 2)}`)
		.with({ _tag: "Codepoint" }, ({ value }) =>
			value < 0x100 ? `    ${hex(value, 2)}` : hex(value, FIELD_WIDTH, " "),
		)
		.exhaustive();

/**
 * Glyph cell(s) for one unit; raw bytes are shown through their byte value.
 *
 * @pure true
 * @postcondition display width of the result is 2
 */
export function renderGlyph(unit: CharacterUnit): string {
	const { value } = unit;
	switch (displayWidth(value)) {
		case 2:
			return String.fromCodePoint(value);
		case 1:
			return `${String.fromCodePoint(value)} `;
		default: {
			const placeholder =
				value < 0x20 ? CONTROL_PICTURES + value : REPLACEMENT_CHARACTER;
			return `${String.fromCodePoint(placeholder)} `;
		}
	}
}

/**
 * Renders one dump line, newline included.
 *
 * @param units - Characters of this line, at most lineWidth of them
 * @param position - Logical position of the first unit
 * @param lineWidth - Configured characters per line
 *
 * @pure true
 * @precondition units.length ≤ lineWidth
 * @complexity O(lineWidth)
 *
 * @example
 * ```ts
 * renderDumpLine([codepoint(0x48), codepoint(0x69)], 0, 2);
 * // "00000000:     48    69     H i \n"
 * ```
 */
export function renderDumpLine(
	units: readonly CharacterUnit[],
	position: number,
	lineWidth: number,
): string {
	if (units.length > lineWidth) {
		throw new Error(
			`units.length must not exceed lineWidth, received ${units.length} > ${lineWidth}`,
		);
	}
	const fields = units.map(renderField).join("");
	const padding = " ".repeat(FIELD_WIDTH * (lineWidth - units.length) + GLYPH_GAP);
	const glyphs = units.map(renderGlyph).join("");
	return `${renderAddress(position)}: ${fields}${padding}${glyphs}\n`;
}
