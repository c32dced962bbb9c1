import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { INT_MAX, parseCount } from "../../../src/shell/config/numbers.js";

const value = (text: string | undefined, maximum?: number): number | string =>
	Either.match(parseCount(text, "start", maximum), {
		onLeft: (error) => error.detail,
		onRight: (n) => n,
	});

describe("parseCount", () => {
	it("reads decimal, hex and octal like strtol base 0", () => {
		expect(value("42")).toBe(42);
		expect(value("0x1F")).toBe(31);
		expect(value("0X1f")).toBe(31);
		expect(value("017")).toBe(15);
		expect(value("0")).toBe(0);
	});

	it("accepts leading whitespace and a plus sign", () => {
		expect(value("  +7")).toBe(7);
		expect(value("-0")).toBe(0);
	});

	it("rejects trailing garbage, bad digits and negatives", () => {
		expect(value("12abc")).toBe("invalid argument '12abc' for start");
		expect(value("08")).toBe("invalid argument '08' for start");
		expect(value("0x")).toBe("invalid argument '0x' for start");
		expect(value("-3")).toBe("invalid argument '-3' for start");
		expect(value("7 ")).toBe("invalid argument '7 ' for start");
	});

	it("rejects values past INT_MAX", () => {
		expect(value(String(INT_MAX))).toBe(INT_MAX);
		expect(value("2147483648")).toBe("invalid argument '2147483648' for start");
	});

	it("reports missing values and values over the maximum", () => {
		expect(value(undefined)).toBe("missing argument for start");
		expect(value("")).toBe("missing argument for start");
		expect(value("256", 255)).toBe("value for start too large (maximum 255)");
		expect(value("255", 255)).toBe(255);
	});
});
