// CHANGE: Typed domain error ADT for the codec using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; fatal ones travel in the Effect error channel
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Invalid command line: bad number, unknown option, unsupported encoding.
 *
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
}> {}

/**
 * Input bytes do not form a character and raw bytes are not tolerated.
 *
 * @invariant offset ≥ 0 (byte offset inside the named source)
 */
export class DecodingFailed extends Data.TaggedError("DecodingFailed")<{
	readonly source: string;
	readonly offset: number;
}> {}

/**
 * Output stream rejected a write.
 */
export class OutputWriteFailed extends Data.TaggedError("OutputWriteFailed")<{
	readonly detail: string;
	readonly code: string | undefined;
}> {}

/** A source could not be opened; the run skips it. */
export class SourceOpenFailed extends Data.TaggedError("SourceOpenFailed")<{
	readonly source: string;
	readonly detail: string;
}> {}

/** Reading a source failed; the rest of it is abandoned. */
export class SourceReadFailed extends Data.TaggedError("SourceReadFailed")<{
	readonly source: string;
	readonly detail: string;
}> {}

/** Closing a source failed after it was consumed. */
export class SourceCloseFailed extends Data.TaggedError("SourceCloseFailed")<{
	readonly source: string;
	readonly detail: string;
}> {}

/**
 * Dump text could not be decoded while reading lines; the source is abandoned.
 */
export class SourceDecodeFailed extends Data.TaggedError("SourceDecodeFailed")<{
	readonly source: string;
	readonly offset: number;
}> {}

/**
 * Recoverable per-source problems: reported, collected, never abort the run.
 */
export type SourceWarning =
	| SourceOpenFailed
	| SourceReadFailed
	| SourceCloseFailed
	| SourceDecodeFailed;

/**
 * Errors that stop a run immediately.
 */
export type FatalError = DecodingFailed | OutputWriteFailed;

/**
 * Union type of all application errors.
 */
export type AppError = ConfigError | FatalError | SourceWarning;

const invalidSequence = (source: string, offset: number): string =>
	`${source}: invalid or incomplete multibyte sequence at byte ${offset}`;

/**
 * Operator-facing text for an error, without program-name prefix.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with({ _tag: "ConfigError" }, (e) => e.detail)
		.with({ _tag: "DecodingFailed" }, (e) => invalidSequence(e.source, e.offset))
		.with({ _tag: "SourceDecodeFailed" }, (e) =>
			invalidSequence(e.source, e.offset),
		)
		.with({ _tag: "OutputWriteFailed" }, (e) => `write error: ${e.detail}`)
		.with(
			{ _tag: "SourceOpenFailed" },
			{ _tag: "SourceReadFailed" },
			{ _tag: "SourceCloseFailed" },
			(e) => `${e.source}: ${e.detail}`,
		)
		.exhaustive();
