// CHANGE: Numeric option values with C strtol base-0 syntax
// PURITY: CORE-like (pure; lives beside the CLI parser that owns the messages)
// INVARIANT: Right(n) → 0 ≤ n ≤ min(maximum, INT_MAX)
// COMPLEXITY: O(|text|)

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";

export const INT_MAX = 2_147_483_647;

// sign, then 0x-hex | 0-octal | decimal; the whole string must match
const NUMBER = /^[ \t\n\v\f\r]*([+-]?)(0[xX][0-9A-Fa-f]+|0[0-7]*|[1-9][0-9]*)$/;

const radixOf = (digits: string): number => {
	if (/^0[xX]/.test(digits)) return 16;
	return digits.length > 1 && digits.startsWith("0") ? 8 : 10;
};

const magnitudeOf = (digits: string): number => {
	const radix = radixOf(digits);
	const body = radix === 16 ? digits.slice(2) : digits;
	return Number.parseInt(body, radix);
};

/**
 * Parses a non-negative option value.
 *
 * @param text - Raw option value; undefined or "" means the value is missing
 * @param name - Long option name used in messages
 * @param maximum - Inclusive upper bound; omitted means INT_MAX only
 *
 * @pure true
 * @example
 * ```ts
 * parseCount("0x10", "start");     // Right(16)
 * parseCount("010", "start");      // Right(8)
 * parseCount("300", "count", 255); // Left("value for count too large (maximum 255)")
 * ```
 */
export function parseCount(
	text: string | undefined,
	name: string,
	maximum?: number,
): Either.Either<number, ConfigError> {
	if (text === undefined || text.length === 0) {
		return Either.left(new ConfigError({ detail: `missing argument for ${name}` }));
	}
	const parts = NUMBER.exec(text);
	const sign = parts?.[1];
	const digits = parts?.[2];
	const invalid = new ConfigError({
		detail: `invalid argument '${text}' for ${name}`,
	});
	if (sign === undefined || digits === undefined) return Either.left(invalid);
	const magnitude = magnitudeOf(digits);
	if ((sign === "-" && magnitude !== 0) || magnitude > INT_MAX) {
		return Either.left(invalid);
	}
	if (maximum !== undefined && magnitude > maximum) {
		return Either.left(
			new ConfigError({
				detail: `value for ${name} too large (maximum ${maximum})`,
			}),
		);
	}
	return Either.right(magnitude);
}
