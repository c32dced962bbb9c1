// CHANGE: Node implementations of the source port: files through fs/promises, "-" through process.stdin
// PURITY: SHELL
// EFFECT: open: Effect<ByteSource, SourceOpenFailed>; read/close typed per ByteSource
// INVARIANT: Standard input always opens; its iterator is shared, so a second "-" sees end of input
// COMPLEXITY: O(n / CHUNK_SIZE) reads per source of n bytes

import { type FileHandle, open } from "node:fs/promises";
import type { Readable } from "node:stream";

import { Effect, Option } from "effect";

import { STDIN_LABEL, STDIN_NAME } from "../../core/models.js";
import {
	SourceCloseFailed,
	SourceOpenFailed,
	SourceReadFailed,
} from "../../core/errors.js";
import type { ByteSource, SourceOpener } from "../../core/types/index.js";

export const CHUNK_SIZE = 64 * 1024;

const SYSTEM_MESSAGE = /^[A-Z][A-Z0-9_]*: ([^,]+)/;

/**
 * Operator text for a system error ("ENOENT: no such file or directory, open 'x'" → "No such file or directory").
 *
 * @pure true
 */
export function describeSystemError(error: unknown): string {
	const message = error instanceof Error ? error.message : String(error);
	const text = SYSTEM_MESSAGE.exec(message)?.[1] ?? message;
	return text.charAt(0).toUpperCase() + text.slice(1);
}

function fileSource(label: string, handle: FileHandle): ByteSource {
	return {
		label,
		read: () =>
			Effect.tryPromise({
				try: async () => {
					const buffer = new Uint8Array(CHUNK_SIZE);
					const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null);
					return bytesRead === 0
						? Option.none<Uint8Array>()
						: Option.some(buffer.subarray(0, bytesRead));
				},
				catch: (error) =>
					new SourceReadFailed({ source: label, detail: describeSystemError(error) }),
			}),
		close: () =>
			Effect.tryPromise({
				try: () => handle.close(),
				catch: (error) =>
					new SourceCloseFailed({ source: label, detail: describeSystemError(error) }),
			}),
	};
}

/**
 * Opens a file for reading.
 *
 * @effect Effect<ByteSource, SourceOpenFailed>
 */
export const openFileSource = (
	name: string,
): Effect.Effect<ByteSource, SourceOpenFailed> =>
	Effect.tryPromise({
		try: () => open(name, "r"),
		catch: (error) =>
			new SourceOpenFailed({ source: name, detail: describeSystemError(error) }),
	}).pipe(Effect.map((handle) => fileSource(name, handle)));

const toBytes = (chunk: unknown): Uint8Array =>
	chunk instanceof Uint8Array ? chunk : new TextEncoder().encode(String(chunk));

const iterators = new WeakMap<Readable, AsyncIterator<unknown>>();

function iteratorOf(stream: Readable): AsyncIterator<unknown> {
	const cached = iterators.get(stream);
	if (cached !== undefined) return cached;
	const created: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
	iterators.set(stream, created);
	return created;
}

/**
 * Source over a readable stream. Closing leaves the stream open for later "-" operands.
 */
export function streamSource(label: string, stream: Readable): ByteSource {
	return {
		label,
		read: () =>
			Effect.tryPromise({
				try: async () => {
					const next = await iteratorOf(stream).next();
					return next.done === true
						? Option.none<Uint8Array>()
						: Option.some(toBytes(next.value));
				},
				catch: (error) =>
					new SourceReadFailed({ source: label, detail: describeSystemError(error) }),
			}),
		close: () => Effect.void,
	};
}

/**
 * Opener used by the CLI.
 *
 * @param stdin - Stream behind the "-" operand (defaults to process.stdin)
 */
export function createNodeOpener(stdin: Readable = process.stdin): SourceOpener {
	return {
		open: (name) =>
			name === STDIN_NAME
				? Effect.succeed(streamSource(STDIN_LABEL, stdin))
				: openFileSource(name),
	};
}
