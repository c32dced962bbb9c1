// CHANGE: Thin APP delegator from argv to one codec run against stdio
// WHY: Keep process termination in BIN; main returns the exit code as a value
// PURITY: APP (console output; no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every failure is reported once on stderr and mapped to exit code 1
// COMPLEXITY: O(1) orchestration

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { runCodec } from "./app/runCodec.js";
import { describeError, type FatalError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/cli.js";
import { HELP_TEXT, VERSION_TEXT } from "./shell/config/help.js";
import { createNodeOpener } from "./shell/input/node-sources.js";
import { debugLog } from "./shell/output/debug.js";
import { consoleReporter } from "./shell/output/reporter.js";
import { createStreamSink } from "./shell/output/stream-sink.js";

export const PROGRAM_NAME = "cpdump";

const printText = (text: string): Effect.Effect<ExitCode> =>
	Effect.sync(() => {
		process.stdout.write(text);
		return 0;
	});

/**
 * Broken pipes end the run quietly; other fatal errors are printed.
 *
 * @pure false (stderr)
 */
const reportFatal = (error: FatalError): Effect.Effect<ExitCode> =>
	Effect.sync(() => {
		if (error._tag === "OutputWriteFailed" && error.code === "EPIPE") {
			debugLog("output closed by reader (EPIPE)");
		} else {
			console.error(`${PROGRAM_NAME}: ${describeError(error)}`);
		}
		return 1;
	});

/**
 * Entry for programmatic usage (without terminating the process).
 *
 * @param args - Command-line arguments without node and script path
 * @param env - Environment consulted for the locale
 * @returns Effect<ExitCode, never>
 *
 * @pure false (reads sources, writes stdout/stderr), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
	env: Readonly<Record<string, string | undefined>> = process.env,
): Effect.Effect<ExitCode> {
	const parsed = parseCLIArgs(args, env);
	if (Either.isLeft(parsed)) {
		return Effect.sync(() => {
			console.error(`${PROGRAM_NAME}: ${describeError(parsed.left)}`);
			return 1;
		});
	}
	return match(parsed.right)
		.with({ _tag: "Help" }, () => printText(HELP_TEXT))
		.with({ _tag: "Version" }, () => printText(VERSION_TEXT))
		.with({ _tag: "Run" }, ({ config }) => {
			debugLog(
				`${config.direction} charset=${config.charset.name} width=${config.lineWidth} sources=${config.sources.join(",")}`,
			);
			return runCodec(config, {
				opener: createNodeOpener(process.stdin),
				output: createStreamSink(process.stdout),
				reporter: consoleReporter,
			}).pipe(
				Effect.map((result) => result.exitCode),
				Effect.catchAll(reportFatal),
			);
		})
		.exhaustive();
}
