// CHANGE: Multi-source character reader presenting an ordered source list as one character stream
// WHY: Both pipeline directions pull from "files then stdin" without caring where one source ends
// PURITY: SHELL (owns open sources; reports per-source failures through the error sink)
// EFFECT: nextCharacter: Effect<InputItem, DecodingFailed>; nextLine: Effect<Option<string>, never>
// INVARIANT: A character is never decoded across two sources
// INVARIANT: Source advancing is an explicit loop; a failing source is reported once and skipped
// COMPLEXITY: O(n) total over n input bytes

import { Data, Effect, Either, Option } from "effect";

import { concatBytes, EMPTY_BYTES } from "../../core/bytes.js";
import {
	codepoint,
	endOfInput,
	type InputItem,
	rawByte,
} from "../../core/character.js";
import type { CharDecoder, Charset } from "../../core/charset/types.js";
import {
	DecodingFailed,
	SourceDecodeFailed,
	type SourceWarning,
} from "../../core/errors.js";
import type {
	ByteSource,
	ErrorSink,
	SourceOpener,
} from "../../core/types/index.js";
import { debugLog } from "../output/debug.js";

export interface CharacterReaderOptions {
	readonly charset: Charset;
	/** Invalid sequences yield RawByte items instead of failing. */
	readonly tolerateBadBytes: boolean;
}

export interface ReaderEnvironment {
	readonly opener: SourceOpener;
	readonly reporter: ErrorSink;
}

interface OpenSource {
	readonly label: string;
	readonly source: ByteSource;
	readonly decoder: CharDecoder;
	buffer: Uint8Array;
	offset: number;
	/** Bytes of this source dropped from the front of `buffer` so far. */
	consumedBefore: number;
	ended: boolean;
}

type SourceStep = Data.TaggedEnum<{
	Character: { readonly codepoint: number };
	BadSequence: {};
	Exhausted: {};
}>;
const SourceStep = Data.taggedEnum<SourceStep>();

type LineStep = Data.TaggedEnum<{
	Line: { readonly text: string };
	Abandoned: {};
	Exhausted: {};
}>;
const LineStep = Data.taggedEnum<LineStep>();

const NEWLINE = 0x0a;

/**
 * Reads characters (or lines) from an ordered list of sources.
 *
 * @example
 * ```ts
 * const reader = new CharacterReader(["a.txt", "-"], { charset: utf8, tolerateBadBytes: true }, env);
 * const item = yield* reader.nextCharacter();
 * ```
 */
export class CharacterReader {
	private nextIndex = 0;
	private current: OpenSource | undefined = undefined;
	private readonly collected: SourceWarning[] = [];

	constructor(
		private readonly sources: readonly string[],
		private readonly options: CharacterReaderOptions,
		private readonly env: ReaderEnvironment,
	) {}

	/** Every per-source warning reported so far, in order. */
	get warnings(): readonly SourceWarning[] {
		return this.collected;
	}

	/**
	 * Next character of the concatenated input.
	 *
	 * @postcondition EndOfInput is returned once every source is exhausted, and on every later call
	 */
	nextCharacter(): Effect.Effect<InputItem, DecodingFailed> {
		return Effect.gen(this, function* () {
			for (;;) {
				const opened = yield* this.ensureOpen();
				if (Option.isNone(opened)) return endOfInput;
				const state = opened.value;
				const step = yield* this.decodeNext(state);
				switch (step._tag) {
					case "Character":
						return codepoint(step.codepoint);
					case "BadSequence":
						return yield* this.takeRawByte(state);
					case "Exhausted":
						yield* this.closeCurrent();
				}
			}
		});
	}

	/**
	 * Next line of decoded text, newline included when it fits.
	 *
	 * @param maxLength - Line buffer size; at most maxLength - 1 characters are returned
	 * @precondition maxLength ≥ 2
	 * @postcondition None only when every source is exhausted
	 */
	nextLine(maxLength: number): Effect.Effect<Option.Option<string>> {
		if (!Number.isInteger(maxLength) || maxLength < 2) {
			return Effect.dieMessage(`maxLength must be an integer ≥ 2, received ${maxLength}`);
		}
		return Effect.gen(this, function* () {
			for (;;) {
				const opened = yield* this.ensureOpen();
				if (Option.isNone(opened)) return Option.none<string>();
				const step = yield* this.readLine(opened.value, maxLength - 1);
				switch (step._tag) {
					case "Line":
						return Option.some(step.text);
					case "Abandoned":
					case "Exhausted":
						yield* this.closeCurrent();
				}
			}
		});
	}

	/**
	 * Closes the open source, if any; sources not yet reached are never opened.
	 */
	close(): Effect.Effect<void> {
		return this.closeCurrent();
	}

	private readLine(
		state: OpenSource,
		limit: number,
	): Effect.Effect<LineStep> {
		return Effect.gen(this, function* () {
			let text = "";
			let count = 0;
			while (count < limit) {
				const step = yield* this.decodeNext(state);
				if (step._tag === "Exhausted") break;
				if (step._tag === "BadSequence") {
					yield* this.report(
						new SourceDecodeFailed({
							source: state.label,
							offset: state.consumedBefore + state.offset,
						}),
					);
					return LineStep.Abandoned();
				}
				text += String.fromCodePoint(step.codepoint);
				count += 1;
				if (step.codepoint === NEWLINE) break;
			}
			return count === 0 ? LineStep.Exhausted() : LineStep.Line({ text });
		});
	}

	private takeRawByte(state: OpenSource): Effect.Effect<InputItem, DecodingFailed> {
		const offset = state.consumedBefore + state.offset;
		if (!this.options.tolerateBadBytes) {
			return Effect.fail(new DecodingFailed({ source: state.label, offset }));
		}
		const byte = state.buffer[state.offset];
		state.offset += 1;
		state.decoder.reset();
		return Effect.succeed(rawByte(byte));
	}

	/**
	 * Decodes at the current offset, pulling chunks and consuming shift sequences as needed.
	 *
	 * @invariant BadSequence leaves state.offset on the first byte of the offending sequence
	 */
	private decodeNext(state: OpenSource): Effect.Effect<SourceStep> {
		return Effect.gen(this, function* () {
			for (;;) {
				if (state.offset >= state.buffer.length) {
					if (state.ended) return SourceStep.Exhausted();
					yield* this.fill(state);
					continue;
				}
				const step = state.decoder.next(state.buffer, state.offset, state.ended);
				switch (step._tag) {
					case "Decoded":
						state.offset += step.consumed;
						return SourceStep.Character({ codepoint: step.codepoint });
					case "Skip":
						state.offset += step.consumed;
						break;
					case "Invalid":
						return SourceStep.BadSequence();
					case "Incomplete":
						if (state.ended) return SourceStep.BadSequence();
						yield* this.fill(state);
						break;
				}
			}
		});
	}

	/**
	 * Appends the next chunk to the unconsumed tail of the buffer.
	 * A read error is reported and ends the source; buffered bytes are dropped with it.
	 */
	private fill(state: OpenSource): Effect.Effect<void> {
		return Effect.gen(this, function* () {
			const chunk = yield* Effect.either(state.source.read());
			if (Either.isLeft(chunk)) {
				yield* this.report(chunk.left);
				state.consumedBefore += state.buffer.length;
				state.buffer = EMPTY_BYTES;
				state.offset = 0;
				state.ended = true;
				return;
			}
			if (Option.isNone(chunk.right)) {
				state.ended = true;
				return;
			}
			const tail = state.buffer.subarray(state.offset);
			state.consumedBefore += state.offset;
			state.buffer = concatBytes([tail, chunk.right.value]);
			state.offset = 0;
		});
	}

	private ensureOpen(): Effect.Effect<Option.Option<OpenSource>> {
		return Effect.gen(this, function* () {
			let current = this.current;
			while (current === undefined) {
				const name = this.sources[this.nextIndex];
				if (name === undefined) return Option.none<OpenSource>();
				this.nextIndex += 1;
				const opened = yield* Effect.either(this.env.opener.open(name));
				if (Either.isLeft(opened)) {
					yield* this.report(opened.left);
					continue;
				}
				debugLog(`open ${opened.right.label}`);
				current = {
					label: opened.right.label,
					source: opened.right,
					decoder: this.options.charset.createDecoder(),
					buffer: EMPTY_BYTES,
					offset: 0,
					consumedBefore: 0,
					ended: false,
				};
				this.current = current;
			}
			return Option.some(current);
		});
	}

	private closeCurrent(): Effect.Effect<void> {
		return Effect.gen(this, function* () {
			const state = this.current;
			if (state === undefined) return;
			this.current = undefined;
			const closed = yield* Effect.either(state.source.close());
			if (Either.isLeft(closed)) {
				yield* this.report(closed.left);
			}
			debugLog(
				`close ${state.label} after ${state.consumedBefore + state.offset} bytes`,
			);
		});
	}

	private report(warning: SourceWarning): Effect.Effect<void> {
		return Effect.sync(() => {
			this.collected.push(warning);
		}).pipe(Effect.andThen(this.env.reporter.report(warning)));
	}
}
