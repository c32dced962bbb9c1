// CHANGE: Tagged character units flowing from the reader to the renderer and back out of the parser
// PURITY: CORE
// INVARIANT: RawByte and Codepoint never share a representation; 0 ≤ RawByte.value ≤ 0xFF
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * One item pulled from the character reader.
 *
 * - `Codepoint`: decoded Unicode scalar value
 * - `RawByte`: a byte kept verbatim because it did not decode
 * - `EndOfInput`: every source is exhausted; never rendered
 */
export type InputItem = Data.TaggedEnum<{
	Codepoint: { readonly value: number };
	RawByte: { readonly value: number };
	EndOfInput: {};
}>;

export const InputItem = Data.taggedEnum<InputItem>();

/** A transmitted character: everything the reader yields except the sentinel. */
export type CharacterUnit = Exclude<InputItem, { readonly _tag: "EndOfInput" }>;

export const codepoint = (value: number): CharacterUnit =>
	InputItem.Codepoint({ value });

export const rawByte = (value: number): CharacterUnit =>
	InputItem.RawByte({ value: value & 0xff });

export const endOfInput: InputItem = InputItem.EndOfInput();

export const isEndOfInput = InputItem.$is("EndOfInput");
