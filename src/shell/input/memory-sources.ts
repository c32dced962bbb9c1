// CHANGE: In-memory source port for the library API and tests
// PURITY: SHELL (mutable cursor per opened source, no I/O)
// INVARIANT: Contents are delivered in chunks of at most chunkSize bytes, in order
// COMPLEXITY: O(n / chunkSize) reads

import { Effect, Option } from "effect";

import { STDIN_LABEL, STDIN_NAME } from "../../core/models.js";
import {
	SourceCloseFailed,
	SourceOpenFailed,
	SourceReadFailed,
} from "../../core/errors.js";
import type { ByteSource, SourceOpener } from "../../core/types/index.js";

/**
 * Contents of one named source. Strings are stored as UTF-8.
 *
 * - `failRead`: the read after the last chunk fails with this detail
 * - `failClose`: closing fails with this detail
 */
export type MemoryEntry =
	| Uint8Array
	| string
	| {
			readonly contents: Uint8Array | string;
			readonly failRead?: string;
			readonly failClose?: string;
	  };

export interface MemoryOpenerOptions {
	readonly chunkSize?: number;
}

const asBytes = (contents: Uint8Array | string): Uint8Array =>
	typeof contents === "string" ? new TextEncoder().encode(contents) : contents;

function memorySource(
	label: string,
	entry: MemoryEntry,
	chunkSize: number,
): ByteSource {
	const spec =
		typeof entry === "string" || entry instanceof Uint8Array
			? { contents: entry }
			: entry;
	const bytes = asBytes(spec.contents);
	let position = 0;
	return {
		label,
		read: () =>
			Effect.suspend(() => {
				if (position < bytes.length) {
					const chunk = bytes.subarray(position, position + chunkSize);
					position += chunk.length;
					return Effect.succeed(Option.some(chunk));
				}
				return spec.failRead === undefined
					? Effect.succeed(Option.none<Uint8Array>())
					: Effect.fail(new SourceReadFailed({ source: label, detail: spec.failRead }));
			}),
		close: () =>
			spec.failClose === undefined
				? Effect.void
				: Effect.fail(new SourceCloseFailed({ source: label, detail: spec.failClose })),
	};
}

/**
 * Opener over a name → contents table; "-" is labelled "stdin" like the real thing.
 *
 * @example
 * ```ts
 * const opener = createMemoryOpener({ "a.txt": "Hi!", "-": new Uint8Array([0xff]) });
 * ```
 */
export function createMemoryOpener(
	entries: Readonly<Record<string, MemoryEntry>>,
	options: MemoryOpenerOptions = {},
): SourceOpener {
	const chunkSize = Math.max(1, options.chunkSize ?? 4096);
	return {
		open: (name) => {
			const entry = Object.hasOwn(entries, name) ? entries[name] : undefined;
			if (entry === undefined) {
				return Effect.fail(
					new SourceOpenFailed({ source: name, detail: "No such file or directory" }),
				);
			}
			const label = name === STDIN_NAME ? STDIN_LABEL : name;
			return Effect.succeed(memorySource(label, entry, chunkSize));
		},
	};
}
