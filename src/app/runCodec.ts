// CHANGE: Direction dispatch for one codec run
// PURITY: APP
// EFFECT: Effect<RunResult, FatalError>
// INVARIANT: Exactly one of runDump / runUndump executes per call
// COMPLEXITY: O(1) dispatch

import type { Effect } from "effect";
import { match } from "ts-pattern";

import type { FatalError } from "../core/errors.js";
import type { CodecConfig, RunResult } from "../core/models.js";
import type { CodecEnvironment } from "../core/types/index.js";
import { runDump } from "./dump.js";
import { runUndump } from "./undump.js";

/**
 * Runs the pipeline in the configured direction.
 *
 * @pure false
 * @invariant result.exitCode ∈ {0,1}
 */
export const runCodec = (
	config: CodecConfig,
	env: CodecEnvironment,
): Effect.Effect<RunResult, FatalError> =>
	match(config.direction)
		.with("dump", () => runDump(config, env))
		.with("undump", () => runUndump(config, env))
		.exhaustive();
