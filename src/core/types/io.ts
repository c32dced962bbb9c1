// CHANGE: Ports between the codec pipeline and the outside world
// WHY: APP drives the pipeline against these interfaces; SHELL supplies Node and in-memory implementations
// PURITY: CORE (interfaces only)
// EFFECT: every operation is an Effect; errors are typed in the error channel
// INVARIANT: At most one operation per port is in flight at any time
// COMPLEXITY: O(1)

import type { Effect, Option } from "effect";

import type {
	OutputWriteFailed,
	SourceCloseFailed,
	SourceOpenFailed,
	SourceReadFailed,
	SourceWarning,
} from "../errors.js";

/**
 * An opened input source delivering bytes in chunks.
 *
 * @invariant read() yields None exactly once, at end of source
 */
export interface ByteSource {
	/** Name used in operator messages ("stdin" for standard input). */
	readonly label: string;
	read(): Effect.Effect<Option.Option<Uint8Array>, SourceReadFailed>;
	close(): Effect.Effect<void, SourceCloseFailed>;
}

/**
 * Opens source names from the configured list; "-" is standard input.
 */
export interface SourceOpener {
	open(name: string): Effect.Effect<ByteSource, SourceOpenFailed>;
}

/**
 * Destination of the run's output bytes.
 *
 * @postcondition after flush() every byte passed to write() has been handed to the destination
 */
export interface OutputSink {
	write(bytes: Uint8Array): Effect.Effect<void, OutputWriteFailed>;
	flush(): Effect.Effect<void, OutputWriteFailed>;
}

/**
 * Receives recoverable per-source errors as they happen.
 */
export interface ErrorSink {
	report(warning: SourceWarning): Effect.Effect<void>;
}

/**
 * Everything a run touches besides its configuration.
 */
export interface CodecEnvironment {
	readonly opener: SourceOpener;
	readonly output: OutputSink;
	readonly reporter: ErrorSink;
}
