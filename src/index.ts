// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE codec pieces and the adapters needed to drive them
// PURITY: Re-exports only (meta-module)
// INVARIANT: CLI-only modules (argv parsing, process streams) stay behind the bin
// COMPLEXITY: O(1), module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pipeline runs against any source opener and output sink.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { createMemoryOpener, createMemorySink, runCodec, silentReporter, utf8 } from "codepoint-dump";
 *
 * const output = createMemorySink();
 * const result = await Effect.runPromise(
 *   runCodec(
 *     { direction: "dump", lineWidth: 8, startOffset: 0, maxCharacters: Infinity,
 *       tolerateBadBytes: false, sources: ["-"], charset: utf8 },
 *     { opener: createMemoryOpener({ "-": "Hi!" }), output, reporter: silentReporter },
 *   ),
 * );
 * ```
 */
export { runDump } from "./app/dump.js";
export { dumpBytes, type MemoryRunOptions, type MemoryRunOutput, undumpText } from "./app/memory.js";
export { runCodec } from "./app/runCodec.js";
export { maxLineLength, runUndump } from "./app/undump.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CharacterUnit,
	codepoint,
	endOfInput,
	InputItem,
	isEndOfInput,
	rawByte,
} from "./core/character.js";
export {
	ascii,
	CHARSETS,
	type CharDecoder,
	type CharEncoder,
	type Charset,
	DEFAULT_CHARSET,
	type DecodeStep,
	getCharset,
	latin1,
	normalizeCharsetName,
	utf7,
	utf8,
} from "./core/charset/index.js";
export { parseDumpFields, parseDumpLine, parseField } from "./core/dump/parse.js";
export { renderDumpLine, renderField, renderGlyph } from "./core/dump/render.js";
export { displayWidth } from "./core/dump/width.js";
export {
	type AppError,
	ConfigError,
	DecodingFailed,
	describeError,
	type FatalError,
	OutputWriteFailed,
	SourceCloseFailed,
	SourceDecodeFailed,
	SourceOpenFailed,
	SourceReadFailed,
	type SourceWarning,
} from "./core/errors.js";
export type { CodecConfig, Direction, ExitCode, RunResult } from "./core/models.js";
export { ShiftState } from "./core/shift-state.js";
export type {
	ByteSource,
	CodecEnvironment,
	ErrorSink,
	OutputSink,
	SourceOpener,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export { CharacterReader } from "./shell/input/character-reader.js";
export { createMemoryOpener, type MemoryEntry } from "./shell/input/memory-sources.js";
export { createNodeOpener } from "./shell/input/node-sources.js";
export { createMemorySink, type MemorySink } from "./shell/output/memory-sink.js";
export { consoleReporter, silentReporter } from "./shell/output/reporter.js";
export { createStreamSink } from "./shell/output/stream-sink.js";
