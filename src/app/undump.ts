// CHANGE: Undump direction of the pipeline: dump lines → parser → output bytes
// PURITY: APP
// EFFECT: Effect<RunResult, FatalError>
// INVARIANT: One ShiftState spans the whole run and is finalized exactly once, before flush
// INVARIANT: The budget is checked before each line; a line is always written in full
// COMPLEXITY: O(n) over n characters of dump text

import { Effect, Option } from "effect";

import { toRunResult } from "../core/decision.js";
import { parseDumpLine } from "../core/dump/parse.js";
import type { FatalError } from "../core/errors.js";
import type { CodecConfig, RunResult } from "../core/models.js";
import { ShiftState } from "../core/shift-state.js";
import type { CodecEnvironment } from "../core/types/index.js";
import { CharacterReader } from "../shell/input/character-reader.js";
import { debugLog } from "../shell/output/debug.js";

/**
 * Longest line the parser looks at; longer input lines are handled in pieces.
 *
 * @pure true
 */
export const maxLineLength = (lineWidth: number): number => lineWidth * 8 + 20;

function undumpLines(
	reader: CharacterReader,
	config: CodecConfig,
	env: CodecEnvironment,
): Effect.Effect<void, FatalError> {
	return Effect.gen(function* () {
		const state = new ShiftState(config.charset);
		const limit = maxLineLength(config.lineWidth);
		let budget = config.maxCharacters;
		let characters = 0;

		while (budget > 0) {
			const line = yield* reader.nextLine(limit);
			if (Option.isNone(line)) break;
			const parsed = parseDumpLine(line.value, config.lineWidth, state);
			if (parsed.bytes.length > 0) yield* env.output.write(parsed.bytes);
			budget -= parsed.characters;
			characters += parsed.characters;
		}

		yield* env.output.write(state.finalize());
		yield* env.output.flush();
		debugLog(`undump: ${characters} characters`);
	});
}

/**
 * Converts dump text from the configured sources back into encoded characters.
 *
 * @pure false (reads sources, writes output)
 * @postcondition output ends in the charset's initial shift state
 */
export function runUndump(
	config: CodecConfig,
	env: CodecEnvironment,
): Effect.Effect<RunResult, FatalError> {
	return Effect.gen(function* () {
		const reader = new CharacterReader(
			config.sources,
			{ charset: config.charset, tolerateBadBytes: false },
			env,
		);
		yield* undumpLines(reader, config, env).pipe(Effect.ensuring(reader.close()));
		return toRunResult(reader.warnings);
	});
}
