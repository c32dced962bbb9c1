// CHANGE: Terminal display width of a codepoint, in the manner of POSIX wcwidth()
// PURITY: CORE
// INVARIANT: result ∈ {-1, 0, 1, 2}; -1 marks values with no printable form
// COMPLEXITY: O(1) (regex test on one codepoint, table lookup in get-east-asian-width)

import { eastAsianWidth } from "get-east-asian-width";

export type DisplayWidth = -1 | 0 | 1 | 2;

const UNASSIGNED = /^\p{Cn}$/u;
const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const SOFT_HYPHEN = 0xad;

const isControl = (value: number): boolean =>
	value < 0x20 || (value >= 0x7f && value < 0xa0);

const isHangulMedialOrFinal = (value: number): boolean =>
	value >= 0x1160 && value <= 0x11ff;

/**
 * Number of terminal cells a codepoint occupies.
 *
 * @pure true
 * @example
 * ```ts
 * displayWidth(0x41);   // 1
 * displayWidth(0x4e2d); // 2 (中)
 * displayWidth(0x0301); // 0 (combining acute)
 * displayWidth(0x07);   // -1
 * ```
 */
export function displayWidth(value: number): DisplayWidth {
	if (value === 0) return 0;
	if (!Number.isInteger(value) || value < 0 || isControl(value)) return -1;
	if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) return -1;

	const ch = String.fromCodePoint(value);
	if (UNASSIGNED.test(ch)) return -1;
	if (value === SOFT_HYPHEN) return 1;
	if (ZERO_WIDTH.test(ch) || isHangulMedialOrFinal(value)) return 0;
	return eastAsianWidth(value) === 2 ? 2 : 1;
}
