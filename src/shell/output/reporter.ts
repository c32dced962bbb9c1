// CHANGE: Error sink printing per-source warnings as "label: message" on stderr
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: One stderr line per reported warning; the run is never aborted here
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { describeError } from "../../core/errors.js";
import type { ErrorSink } from "../../core/types/index.js";

/**
 * Reporter used by the CLI.
 *
 * @pure false (console.error)
 */
export const consoleReporter: ErrorSink = {
	report: (warning) =>
		Effect.sync(() => {
			console.error(describeError(warning));
		}),
};

/**
 * Reporter that prints nothing; the run result still carries every warning.
 *
 * @pure true
 */
export const silentReporter: ErrorSink = {
	report: () => Effect.void,
};
