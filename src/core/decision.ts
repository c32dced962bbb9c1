// CHANGE: Pure decision function computing the run's exit code
// FORMAT THEOREM: ∀s ∈ State: s.hasSourceErrors ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { SourceWarning } from "./errors.js";
import type { DecisionState, ExitCode, RunResult } from "./models.js";

/**
 * Computes process exit code from the run state.
 *
 * @param state - Immutable flags collected during the run
 * @returns 1 if any source reported an error; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ hasSourceErrors: true });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s) => s.hasSourceErrors, (failed): ExitCode => (failed ? 1 : 0));

/**
 * Builds the run result from the warnings a reader collected.
 *
 * @pure true
 * @postcondition result.exitCode = 1 ↔ warnings.length > 0
 */
export const toRunResult = (warnings: readonly SourceWarning[]): RunResult => ({
	exitCode: computeExitCode({ hasSourceErrors: warnings.length > 0 }),
	warnings,
});
