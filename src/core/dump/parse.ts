// CHANGE: Inverse of the renderer: dump line → character units → output bytes
// PURITY: CORE (bytes are returned; the only mutation is the caller's ShiftState)
// INVARIANT: result.characters ≤ lineWidth; lines without a space yield no characters
// COMPLEXITY: O(lineWidth) per line

import { Option } from "effect";
import { match } from "ts-pattern";

import { concatBytes, EMPTY_BYTES } from "../bytes.js";
import { type CharacterUnit, codepoint, rawByte } from "../character.js";
import type { ShiftState } from "../shift-state.js";
import { FIELD_WIDTH } from "./render.js";

const CODEPOINT_FIELD = /^ *([0-9A-Fa-f]{1,6})$/;
const RAW_BYTE_FIELD = /^ *\*([0-9A-Fa-f]{2})$/;

export interface ParsedDumpLine {
	/** Fields decoded; the caller subtracts it from the output budget. */
	readonly characters: number;
	readonly bytes: Uint8Array;
}

/**
 * Decodes one 6-column field.
 *
 * @pure true
 * @example
 * ```ts
 * parseField("    48"); // Some(Codepoint 0x48)
 * parseField("   *FF"); // Some(RawByte 0xFF)
 * parseField("      "); // None
 * ```
 */
export function parseField(field: string): Option.Option<CharacterUnit> {
	if (field.length !== FIELD_WIDTH) return Option.none();
	const hexDigits = CODEPOINT_FIELD.exec(field)?.[1];
	if (hexDigits !== undefined) {
		return Option.some(codepoint(Number.parseInt(hexDigits, 16)));
	}
	const byteDigits = RAW_BYTE_FIELD.exec(field)?.[1];
	if (byteDigits !== undefined) {
		return Option.some(rawByte(Number.parseInt(byteDigits, 16)));
	}
	return Option.none();
}

/**
 * Character units of a dump line, up to the first field that does not parse.
 *
 * @pure true
 * @postcondition result.length ≤ lineWidth
 */
export function parseDumpFields(
	line: string,
	lineWidth: number,
): readonly CharacterUnit[] {
	const separator = line.indexOf(" ");
	if (separator < 0) return [];
	const units: CharacterUnit[] = [];
	let cursor = separator + 1;
	while (units.length < lineWidth) {
		const unit = parseField(line.slice(cursor, cursor + FIELD_WIDTH));
		if (Option.isNone(unit)) break;
		units.push(unit.value);
		cursor += FIELD_WIDTH;
	}
	return units;
}

/**
 * Bytes for one unit at the current shift state.
 */
export const encodeUnit = (unit: CharacterUnit, state: ShiftState): Uint8Array =>
	match(unit)
		.with({ _tag: "Codepoint" }, ({ value }) => state.encodeCodepoint(value))
		.with({ _tag: "RawByte" }, ({ value }) => state.encodeRawByte(value))
		.exhaustive();

/**
 * Parses one dump line and encodes its characters through the run's shift state.
 *
 * @param line - One line of dump text, newline optional
 * @param lineWidth - Fields per line the dump was rendered with
 * @param state - Shift state shared by every line of the run
 *
 * @pure false (advances state)
 * @invariant Raw bytes pass through verbatim after the state returns to initial
 * @complexity O(lineWidth)
 */
export function parseDumpLine(
	line: string,
	lineWidth: number,
	state: ShiftState,
): ParsedDumpLine {
	const units = parseDumpFields(line, lineWidth);
	if (units.length === 0) return { characters: 0, bytes: EMPTY_BYTES };
	return {
		characters: units.length,
		bytes: concatBytes(units.map((unit) => encodeUnit(unit, state))),
	};
}
