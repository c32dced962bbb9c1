// CHANGE: Buffered output sink over a Node writable stream (process.stdout for the CLI)
// PURITY: SHELL
// EFFECT: write/flush: Effect<void, OutputWriteFailed>
// INVARIANT: Bytes reach the stream in write order; at most bufferSize bytes are held back
// INVARIANT: Once the stream has failed, every later write and flush fails with the same error
// INVARIANT: The sink's error listener is attached only between the first pending write and a successful flush
// COMPLEXITY: O(n) over n written bytes

import type { Writable } from "node:stream";

import { Effect } from "effect";

import { concatBytes } from "../../core/bytes.js";
import { OutputWriteFailed } from "../../core/errors.js";
import type { OutputSink } from "../../core/types/index.js";
import { describeSystemError } from "../input/node-sources.js";

export const OUTPUT_BUFFER_SIZE = 64 * 1024;

/**
 * Maps a stream error to the fatal output error, keeping its errno code (e.g. "EPIPE").
 *
 * @pure true
 */
export function toWriteFailed(error: unknown): OutputWriteFailed {
	const code =
		error instanceof Error && "code" in error && typeof error.code === "string"
			? error.code
			: undefined;
	return new OutputWriteFailed({ detail: describeSystemError(error), code });
}

export interface StreamSinkOptions {
	readonly bufferSize?: number;
}

/**
 * Output sink writing to a stream; the stream is never ended.
 */
export function createStreamSink(
	stream: Writable,
	options: StreamSinkOptions = {},
): OutputSink {
	const bufferSize = options.bufferSize ?? OUTPUT_BUFFER_SIZE;
	let pending: Uint8Array[] = [];
	let pendingBytes = 0;
	let failure: OutputWriteFailed | undefined;

	let listening = false;

	const onError = (error: Error): void => {
		failure ??= toWriteFailed(error);
	};

	// from the first pending write until a flush succeeds
	const listen = (): void => {
		if (listening) return;
		stream.on("error", onError);
		listening = true;
	};

	const release = (): void => {
		stream.off("error", onError);
		listening = false;
	};

	const writeChunk = (chunk: Uint8Array): Effect.Effect<void, OutputWriteFailed> =>
		Effect.async<void, OutputWriteFailed>((resume) => {
			stream.write(chunk, (error) => {
				if (error === null || error === undefined) {
					resume(Effect.void);
					return;
				}
				failure ??= toWriteFailed(error);
				resume(Effect.fail(failure));
			});
		});

	const drain = (): Effect.Effect<void, OutputWriteFailed> =>
		Effect.suspend(() => {
			if (failure !== undefined) return Effect.fail(failure);
			if (pendingBytes === 0) return Effect.void;
			const chunk = concatBytes(pending);
			pending = [];
			pendingBytes = 0;
			return writeChunk(chunk);
		});

	return {
		write: (bytes) =>
			Effect.suspend(() => {
				if (failure !== undefined) return Effect.fail(failure);
				if (bytes.length === 0) return Effect.void;
				listen();
				pending.push(bytes);
				pendingBytes += bytes.length;
				return pendingBytes >= bufferSize ? drain() : Effect.void;
			}),
		flush: () => drain().pipe(Effect.tap(() => Effect.sync(release))),
	};
}
