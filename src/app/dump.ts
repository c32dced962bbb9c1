// CHANGE: Dump direction of the pipeline: reader → windowing → renderer → output
// PURITY: APP (composes CORE rendering with SHELL reader and sink)
// EFFECT: Effect<RunResult, FatalError>
// INVARIANT: Characters rendered = min(maxCharacters, max(0, L - startOffset)) for input length L
// INVARIANT: Every window except possibly the last holds exactly lineWidth characters
// COMPLEXITY: O(L) time, O(lineWidth) space

import { Effect } from "effect";

import type { CharacterUnit } from "../core/character.js";
import { isEndOfInput } from "../core/character.js";
import { toRunResult } from "../core/decision.js";
import { renderDumpLine } from "../core/dump/render.js";
import type { FatalError } from "../core/errors.js";
import type { CodecConfig, RunResult } from "../core/models.js";
import { ShiftState } from "../core/shift-state.js";
import type { CodecEnvironment } from "../core/types/index.js";
import { CharacterReader } from "../shell/input/character-reader.js";
import { debugLog } from "../shell/output/debug.js";

/**
 * Skips `count` characters; stops early at end of input.
 *
 * @returns Characters actually skipped
 */
function skipCharacters(
	reader: CharacterReader,
	count: number,
): Effect.Effect<number, FatalError> {
	return Effect.gen(function* () {
		let skipped = 0;
		while (skipped < count) {
			const item = yield* reader.nextCharacter();
			if (isEndOfInput(item)) break;
			skipped += 1;
		}
		return skipped;
	});
}

/**
 * Fills one window of up to `size` characters.
 */
function readWindow(
	reader: CharacterReader,
	size: number,
): Effect.Effect<{ readonly units: CharacterUnit[]; readonly ended: boolean }, FatalError> {
	return Effect.gen(function* () {
		const units: CharacterUnit[] = [];
		while (units.length < size) {
			const item = yield* reader.nextCharacter();
			if (isEndOfInput(item)) return { units, ended: true };
			units.push(item);
		}
		return { units, ended: false };
	});
}

function dumpLines(
	reader: CharacterReader,
	config: CodecConfig,
	env: CodecEnvironment,
): Effect.Effect<void, FatalError> {
	return Effect.gen(function* () {
		const text = new ShiftState(config.charset);
		let position = yield* skipCharacters(reader, config.startOffset);
		let budget = config.maxCharacters;
		let lines = 0;
		let ended = position < config.startOffset;

		while (!ended && budget > 0) {
			const window = yield* readWindow(reader, Math.min(config.lineWidth, budget));
			ended = window.ended;
			if (window.units.length === 0) break;
			const line = renderDumpLine(window.units, position, config.lineWidth);
			yield* env.output.write(text.encodeText(line));
			position += window.units.length;
			budget -= window.units.length;
			lines += 1;
		}

		yield* env.output.write(text.finalize());
		yield* env.output.flush();
		debugLog(`dump: ${lines} lines, next position ${position}`);
	});
}

/**
 * Renders the configured sources as dump text.
 *
 * @param config - Immutable run configuration
 * @param env - Source opener, output sink and error sink
 * @returns Effect<RunResult, FatalError>; exitCode is 1 when any source reported an error
 *
 * @pure false (reads sources, writes output)
 * @postcondition every opened source is closed, whether the run succeeds or fails
 *
 * @example
 * ```ts
 * const result = yield* runDump(config, { opener, output, reporter });
 * ```
 */
export function runDump(
	config: CodecConfig,
	env: CodecEnvironment,
): Effect.Effect<RunResult, FatalError> {
	return Effect.gen(function* () {
		const reader = new CharacterReader(
			config.sources,
			{ charset: config.charset, tolerateBadBytes: config.tolerateBadBytes },
			env,
		);
		yield* dumpLines(reader, config, env).pipe(Effect.ensuring(reader.close()));
		return toRunResult(reader.warnings);
	});
}
