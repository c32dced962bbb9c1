// CHANGE: Charset selection from --encoding or the locale environment
// PURITY: SHELL (reads the env record it is given; debug logging)
// INVARIANT: An explicit encoding is never silently replaced
// COMPLEXITY: O(k) over k registered charset names

import { Either, Option, pipe } from "effect";

import { DEFAULT_CHARSET, getCharset } from "../../core/charset/index.js";
import type { Charset } from "../../core/charset/types.js";
import { ConfigError } from "../../core/errors.js";
import { debugLog } from "../output/debug.js";

const LOCALE_VARIABLES = ["LC_ALL", "LC_CTYPE", "LANG"] as const;

// language[_TERRITORY][.CODESET][@modifier]
const CODESET = /^[^.@]*\.([^@]+)/;

/**
 * Codeset of the effective LC_CTYPE locale, if it names one.
 *
 * @pure true
 * @example
 * ```ts
 * localeCodeset({ LANG: "de_DE.ISO-8859-1@euro" }); // Some("ISO-8859-1")
 * localeCodeset({ LC_ALL: "C" });                  // None
 * ```
 */
export function localeCodeset(
	env: Readonly<Record<string, string | undefined>>,
): Option.Option<string> {
	const locale = LOCALE_VARIABLES.map((key) => env[key]).find(
		(value) => value !== undefined && value.length > 0,
	);
	return pipe(
		Option.fromNullable(locale),
		Option.flatMap((value) => Option.fromNullable(CODESET.exec(value)?.[1])),
	);
}

/**
 * Active charset: `--encoding` if given, else the locale's codeset, else UTF-8.
 *
 * @postcondition Left only when `encoding` names no supported charset
 */
export function resolveCharset(
	encoding: string | undefined,
	env: Readonly<Record<string, string | undefined>>,
): Either.Either<Charset, ConfigError> {
	if (encoding !== undefined) {
		return Option.match(getCharset(encoding), {
			onNone: () =>
				Either.left(new ConfigError({ detail: `unsupported encoding '${encoding}'` })),
			onSome: (charset) => Either.right(charset),
		});
	}
	const codeset = localeCodeset(env);
	if (Option.isNone(codeset)) return Either.right(DEFAULT_CHARSET);
	const charset = getCharset(codeset.value);
	if (Option.isNone(charset)) {
		debugLog(
			`locale codeset '${codeset.value}' is not supported, using ${DEFAULT_CHARSET.name}`,
		);
		return Either.right(DEFAULT_CHARSET);
	}
	return Either.right(charset.value);
}
