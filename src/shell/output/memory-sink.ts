// CHANGE: In-memory output sink for the library API and tests
// PURITY: SHELL (accumulates bytes)
// INVARIANT: contents() is the concatenation of every successful write, in order

import { Effect } from "effect";

import { concatBytes } from "../../core/bytes.js";
import { OutputWriteFailed } from "../../core/errors.js";
import type { OutputSink } from "../../core/types/index.js";

export interface MemorySink extends OutputSink {
	contents(): Uint8Array;
	/** Whether flush() has completed at least once. */
	readonly flushed: boolean;
}

export interface MemorySinkOptions {
	/** Every write fails with this error once this many bytes have been accepted. */
	readonly failAfter?: { readonly bytes: number; readonly code?: string };
}

export function createMemorySink(options: MemorySinkOptions = {}): MemorySink {
	const chunks: Uint8Array[] = [];
	let accepted = 0;
	let flushed = false;
	const { failAfter } = options;

	return {
		write: (bytes) =>
			Effect.suspend(() => {
				if (failAfter !== undefined && accepted + bytes.length > failAfter.bytes) {
					return Effect.fail(
						new OutputWriteFailed({
							detail: failAfter.code === "EPIPE" ? "Broken pipe" : "No space left on device",
							code: failAfter.code,
						}),
					);
				}
				chunks.push(bytes.slice());
				accepted += bytes.length;
				return Effect.void;
			}),
		flush: () =>
			Effect.sync(() => {
				flushed = true;
			}),
		contents: () => concatBytes(chunks),
		get flushed() {
			return flushed;
		},
	};
}
