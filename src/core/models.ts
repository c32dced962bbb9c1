// CHANGE: Domain models for the codepoint dump codec (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; configuration is an immutable value passed to every component
// COMPLEXITY: O(1)

import type { Charset } from "./charset/types.js";
import type { SourceWarning } from "./errors.js";

/**
 * Exit code for the codec process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Direction of one run: characters → dump text, or dump text → bytes.
 */
export type Direction = "dump" | "undump";

/** Name under which standard input appears in a source list. */
export const STDIN_NAME = "-";

/** Label used for standard input in operator messages. */
export const STDIN_LABEL = "stdin";

export const DEFAULT_LINE_WIDTH = 8;
export const MAX_LINE_WIDTH = 255;

/**
 * Immutable configuration of one codec run.
 *
 * @property lineWidth Characters per dump line, 1..MAX_LINE_WIDTH
 * @property startOffset Characters skipped before the first dump line (dump only)
 * @property maxCharacters Character budget; `Infinity` when unbounded
 * @property tolerateBadBytes Invalid sequences become raw bytes instead of failing the run
 * @property sources Ordered source names; "-" is standard input
 * @property charset Active text encoding for both directions
 */
export interface CodecConfig {
	readonly direction: Direction;
	readonly lineWidth: number;
	readonly startOffset: number;
	readonly maxCharacters: number;
	readonly tolerateBadBytes: boolean;
	readonly sources: readonly string[];
	readonly charset: Charset;
}

/**
 * Outcome of a run that was not aborted by a fatal error.
 *
 * @invariant warnings.length > 0 ↔ exitCode = 1
 */
export interface RunResult {
	readonly exitCode: ExitCode;
	readonly warnings: readonly SourceWarning[];
}

/**
 * Minimal decision state for producing the exit code.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasSourceErrors: boolean;
}
