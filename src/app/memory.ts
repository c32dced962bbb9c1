// CHANGE: In-memory entry points running the full pipeline over a byte array or dump text
// PURITY: APP (in-memory SHELL adapters only; no file or stream I/O)
// EFFECT: Effect<MemoryRunOutput, FatalError>
// INVARIANT: The input is a single standard-input source; warnings are collected, never printed
// COMPLEXITY: O(n) over n input bytes

import { Effect } from "effect";

import { concatBytes } from "../core/bytes.js";
import { DEFAULT_CHARSET } from "../core/charset/index.js";
import type { Charset } from "../core/charset/types.js";
import type { FatalError } from "../core/errors.js";
import {
	type CodecConfig,
	DEFAULT_LINE_WIDTH,
	type Direction,
	type RunResult,
	STDIN_NAME,
} from "../core/models.js";
import { ShiftState } from "../core/shift-state.js";
import { createMemoryOpener } from "../shell/input/memory-sources.js";
import { createMemorySink } from "../shell/output/memory-sink.js";
import { silentReporter } from "../shell/output/reporter.js";
import { runCodec } from "./runCodec.js";

export interface MemoryRunOptions {
	readonly lineWidth?: number;
	readonly startOffset?: number;
	readonly maxCharacters?: number;
	readonly tolerateBadBytes?: boolean;
	readonly charset?: Charset;
	/** Bytes per simulated read; small values exercise chunk boundaries. */
	readonly chunkSize?: number;
}

export interface MemoryRunOutput extends RunResult {
	readonly output: Uint8Array;
}

function runInMemory(
	direction: Direction,
	input: Uint8Array,
	options: MemoryRunOptions,
): Effect.Effect<MemoryRunOutput, FatalError> {
	const config: CodecConfig = {
		direction,
		lineWidth: options.lineWidth ?? DEFAULT_LINE_WIDTH,
		startOffset: options.startOffset ?? 0,
		maxCharacters: options.maxCharacters ?? Number.POSITIVE_INFINITY,
		tolerateBadBytes: options.tolerateBadBytes ?? false,
		sources: [STDIN_NAME],
		charset: options.charset ?? DEFAULT_CHARSET,
	};
	const output = createMemorySink();
	const opener = createMemoryOpener(
		{ [STDIN_NAME]: input },
		options.chunkSize === undefined ? {} : { chunkSize: options.chunkSize },
	);
	return runCodec(config, { opener, output, reporter: silentReporter }).pipe(
		Effect.map((result) => ({ ...result, output: output.contents() })),
	);
}

const encodeText = (text: string, charset: Charset): Uint8Array => {
	const state = new ShiftState(charset);
	return concatBytes([state.encodeText(text), state.finalize()]);
};

/**
 * Dumps a byte array; the output is dump text encoded in the charset.
 *
 * @example
 * ```ts
 * const { output } = await Effect.runPromise(dumpBytes(new TextEncoder().encode("Hi!")));
 * new TextDecoder().decode(output);
 * // "00000000:     48    69    21                                   H i ! \n"
 * ```
 */
export const dumpBytes = (
	input: Uint8Array,
	options: MemoryRunOptions = {},
): Effect.Effect<MemoryRunOutput, FatalError> =>
	runInMemory("dump", input, options);

/**
 * Undumps dump text. A string is first encoded with the charset, so it may hold any text.
 */
export function undumpText(
	text: string | Uint8Array,
	options: MemoryRunOptions = {},
): Effect.Effect<MemoryRunOutput, FatalError> {
	const input =
		typeof text === "string"
			? encodeText(text, options.charset ?? DEFAULT_CHARSET)
			: text;
	return runInMemory("undump", input, options);
}
