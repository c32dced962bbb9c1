// CHANGE: Registry of built-in charsets with locale-style name matching
// PURITY: CORE
// INVARIANT: normalizeCharsetName is idempotent; every alias maps to exactly one charset
// COMPLEXITY: O(k) where k = number of registered names

import { Option } from "effect";

import { ascii, latin1 } from "./single-byte.js";
import type { Charset } from "./types.js";
import { utf7 } from "./utf7.js";
import { utf8 } from "./utf8.js";

export const CHARSETS: readonly Charset[] = [utf8, latin1, ascii, utf7];

export const DEFAULT_CHARSET: Charset = utf8;

/**
 * Case-insensitive name with "-" and "_" removed ("UTF_8" → "utf8").
 *
 * @pure true
 */
export const normalizeCharsetName = (name: string): string =>
	name.trim().toLowerCase().replace(/[-_]/g, "");

/**
 * Looks a charset up by canonical name or alias.
 *
 * @pure true
 * @example
 * ```ts
 * getCharset("ISO_8859-1"); // Some(latin1)
 * getCharset("klingon");    // None
 * ```
 */
export function getCharset(name: string): Option.Option<Charset> {
	const wanted = normalizeCharsetName(name);
	return Option.fromNullable(
		CHARSETS.find(
			(charset) =>
				normalizeCharsetName(charset.name) === wanted ||
				charset.aliases.includes(wanted),
		),
	);
}

export { ascii, latin1 } from "./single-byte.js";
export type { CharDecoder, CharEncoder, Charset, DecodeStep } from "./types.js";
export { utf7 } from "./utf7.js";
export { encodeUtf8, utf8 } from "./utf8.js";
