// CHANGE: Command-line parsing with GNU getopt_long conventions
// WHY: Options may cluster, take attached values, be abbreviated, and interleave with operands
// PURITY: SHELL (reads process.argv/process.env by default; otherwise pure)
// EFFECT: none; returns Either<CliCommand, ConfigError>
// INVARIANT: The first --help or --version wins over anything after it
// INVARIANT: Right(Run) → 1 ≤ lineWidth ≤ MAX_LINE_WIDTH ∧ sources.length ≥ 1
// COMPLEXITY: O(n) over n arguments

import { Data, Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import {
	type CodecConfig,
	DEFAULT_LINE_WIDTH,
	type Direction,
	MAX_LINE_WIDTH,
	STDIN_NAME,
} from "../../core/models.js";
import { resolveCharset } from "./locale.js";
import { parseCount } from "./numbers.js";

export type CliCommand = Data.TaggedEnum<{
	Run: { readonly config: CodecConfig };
	Help: {};
	Version: {};
}>;

export const CliCommand = Data.taggedEnum<CliCommand>();

export const TRY_HELP = "Try --help for more information.";

interface ParseState {
	readonly direction: Direction;
	readonly lineWidth: number;
	readonly startOffset: number;
	readonly maxCharacters: number;
	readonly tolerateBadBytes: boolean;
	readonly encoding: string | undefined;
	readonly operands: readonly string[];
}

type Stop = "help" | "version";

type Applied = Either.Either<ParseState | Stop, ConfigError>;

interface OptionSpec {
	readonly long: string;
	readonly short: string | undefined;
	readonly takesValue: boolean;
	readonly apply: (state: ParseState, value: string | undefined) => Applied;
}

const numeric =
	(
		name: string,
		update: (state: ParseState, n: number) => ParseState,
		maximum?: number,
	) =>
	(state: ParseState, value: string | undefined): Applied =>
		Either.map(parseCount(value, name, maximum), (n) => update(state, n));

const flag =
	(update: Partial<ParseState>) =>
	(state: ParseState): Applied =>
		Either.right({ ...state, ...update });

const stop =
	(action: Stop) =>
	(): Applied =>
		Either.right(action);

const OPTIONS: readonly OptionSpec[] = [
	{
		long: "count",
		short: "c",
		takesValue: true,
		apply: (state, value) =>
			Either.flatMap(
				numeric("count", (s, n) => ({ ...s, lineWidth: n }), MAX_LINE_WIDTH)(
					state,
					value,
				),
				(next): Applied =>
					typeof next !== "string" && next.lineWidth === 0
						? Either.left(
								new ConfigError({ detail: `invalid argument '${value}' for count` }),
							)
						: Either.right(next),
			),
	},
	{ long: "ignore", short: "i", takesValue: false, apply: flag({ tolerateBadBytes: true }) },
	{
		long: "start",
		short: "s",
		takesValue: true,
		apply: numeric("start", (s, n) => ({ ...s, startOffset: n })),
	},
	{
		long: "limit",
		short: "l",
		takesValue: true,
		apply: numeric("limit", (s, n) => ({ ...s, maxCharacters: n })),
	},
	{ long: "reverse", short: "r", takesValue: false, apply: flag({ direction: "undump" }) },
	{
		long: "encoding",
		short: "e",
		takesValue: true,
		apply: (state, value) =>
			value === undefined || value.length === 0
				? Either.left(new ConfigError({ detail: "missing argument for encoding" }))
				: Either.right({ ...state, encoding: value }),
	},
	{ long: "help", short: undefined, takesValue: false, apply: stop("help") },
	{ long: "version", short: undefined, takesValue: false, apply: stop("version") },
];

const usageError = (message: string): ConfigError =>
	new ConfigError({ detail: `${message}\n${TRY_HELP}` });

/**
 * Exact long name first, then a unique prefix.
 *
 * @pure true
 */
export function findLongOption(name: string): Either.Either<OptionSpec, ConfigError> {
	const exact = OPTIONS.find((option) => option.long === name);
	if (exact !== undefined) return Either.right(exact);
	const candidates = OPTIONS.filter((option) => option.long.startsWith(name));
	const [only, ...rest] = candidates;
	if (only === undefined) {
		return Either.left(usageError(`unrecognized option '--${name}'`));
	}
	if (rest.length > 0) {
		return Either.left(usageError(`option '--${name}' is ambiguous`));
	}
	return Either.right(only);
}

interface Step {
	readonly result: Applied;
	/** Arguments consumed, the option itself included. */
	readonly consumed: number;
}

function longOption(
	arg: string,
	next: string | undefined,
	state: ParseState,
): Step {
	const body = arg.slice(2);
	const eq = body.indexOf("=");
	const name = eq < 0 ? body : body.slice(0, eq);
	const attached = eq < 0 ? undefined : body.slice(eq + 1);
	const found = findLongOption(name);
	if (Either.isLeft(found)) return { result: Either.left(found.left), consumed: 1 };
	const option = found.right;
	if (!option.takesValue) {
		return attached === undefined
			? { result: option.apply(state, undefined), consumed: 1 }
			: {
					result: Either.left(
						usageError(`option '--${option.long}' doesn't allow an argument`),
					),
					consumed: 1,
				};
	}
	return attached === undefined
		? { result: option.apply(state, next), consumed: next === undefined ? 1 : 2 }
		: { result: option.apply(state, attached), consumed: 1 };
}

function shortCluster(
	arg: string,
	next: string | undefined,
	initial: ParseState,
): Step {
	let state = initial;
	for (let i = 1; i < arg.length; i++) {
		const letter = arg.charAt(i);
		const option = OPTIONS.find((candidate) => candidate.short === letter);
		if (option === undefined) {
			return { result: Either.left(usageError(`invalid option -- '${letter}'`)), consumed: 1 };
		}
		if (option.takesValue) {
			const attached = arg.slice(i + 1);
			return attached.length > 0
				? { result: option.apply(state, attached), consumed: 1 }
				: { result: option.apply(state, next), consumed: next === undefined ? 1 : 2 };
		}
		const applied = option.apply(state, undefined);
		if (Either.isLeft(applied)) return { result: applied, consumed: 1 };
		const updated = applied.right;
		if (typeof updated === "string") return { result: Either.right(updated), consumed: 1 };
		state = updated;
	}
	return { result: Either.right(state), consumed: 1 };
}

const isOption = (arg: string): boolean => arg.length > 1 && arg.startsWith("-");

const INITIAL_STATE: ParseState = {
	direction: "dump",
	lineWidth: DEFAULT_LINE_WIDTH,
	startOffset: 0,
	maxCharacters: Number.POSITIVE_INFINITY,
	tolerateBadBytes: false,
	encoding: undefined,
	operands: [],
};

function scan(args: readonly string[]): Applied {
	let state = INITIAL_STATE;
	let i = 0;
	while (i < args.length) {
		const arg = args[i] ?? "";
		if (arg === "--") {
			return Either.right({
				...state,
				operands: [...state.operands, ...args.slice(i + 1)],
			});
		}
		if (!isOption(arg)) {
			state = { ...state, operands: [...state.operands, arg] };
			i += 1;
			continue;
		}
		const next = args[i + 1];
		const step = arg.startsWith("--")
			? longOption(arg, next, state)
			: shortCluster(arg, next, state);
		if (Either.isLeft(step.result)) return step.result;
		const applied = step.result.right;
		if (typeof applied === "string") return Either.right(applied);
		state = applied;
		i += step.consumed;
	}
	return Either.right(state);
}

/**
 * Parses command-line arguments into the command to execute.
 *
 * @param args - Arguments without node and script path
 * @param env - Environment consulted for the locale charset
 * @returns Help, Version, or Run with an immutable CodecConfig; Left on invalid input
 *
 * @example
 * ```ts
 * parseCLIArgs(["-ri", "-c16", "dump.txt"], {});
 * // Right(Run { direction: "undump", tolerateBadBytes: true, lineWidth: 16, sources: ["dump.txt"], ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
	env: Readonly<Record<string, string | undefined>> = process.env,
): Either.Either<CliCommand, ConfigError> {
	const scanned = scan(args);
	if (Either.isLeft(scanned)) return Either.left(scanned.left);
	const state = scanned.right;
	if (state === "help") return Either.right(CliCommand.Help());
	if (state === "version") return Either.right(CliCommand.Version());
	return Either.map(resolveCharset(state.encoding, env), (charset) =>
		CliCommand.Run({
			config: {
				direction: state.direction,
				lineWidth: state.lineWidth,
				startOffset: state.startOffset,
				maxCharacters: state.maxCharacters,
				tolerateBadBytes: state.tolerateBadBytes,
				sources: state.operands.length > 0 ? state.operands : [STDIN_NAME],
				charset,
			},
		}),
	);
}
