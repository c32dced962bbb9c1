import { describe, expect, it } from "vitest";

import { computeExitCode, toRunResult } from "../../src/core/decision.js";
import {
	ConfigError,
	DecodingFailed,
	describeError,
	OutputWriteFailed,
	SourceCloseFailed,
	SourceDecodeFailed,
	SourceOpenFailed,
	SourceReadFailed,
} from "../../src/core/errors.js";

describe("describeError", () => {
	it("prefixes per-source problems with the source label", () => {
		expect(
			describeError(new SourceOpenFailed({ source: "a.txt", detail: "No such file or directory" })),
		).toBe("a.txt: No such file or directory");
		expect(describeError(new SourceReadFailed({ source: "stdin", detail: "I/O error" }))).toBe(
			"stdin: I/O error",
		);
		expect(
			describeError(new SourceCloseFailed({ source: "b", detail: "Bad file descriptor" })),
		).toBe("b: Bad file descriptor");
	});

	it("names the byte offset of invalid sequences", () => {
		expect(describeError(new DecodingFailed({ source: "stdin", offset: 4 }))).toBe(
			"stdin: invalid or incomplete multibyte sequence at byte 4",
		);
		expect(describeError(new SourceDecodeFailed({ source: "d.txt", offset: 0 }))).toBe(
			"d.txt: invalid or incomplete multibyte sequence at byte 0",
		);
	});

	it("describes output and configuration errors", () => {
		expect(
			describeError(new OutputWriteFailed({ detail: "Broken pipe", code: "EPIPE" })),
		).toBe("write error: Broken pipe");
		expect(describeError(new ConfigError({ detail: "missing argument for count" }))).toBe(
			"missing argument for count",
		);
	});
});

describe("computeExitCode", () => {
	it("maps source errors to 1 and a clean run to 0", () => {
		expect(computeExitCode({ hasSourceErrors: false })).toBe(0);
		expect(computeExitCode({ hasSourceErrors: true })).toBe(1);
	});

	it("derives the run result from collected warnings", () => {
		const warning = new SourceOpenFailed({ source: "x", detail: "denied" });
		expect(toRunResult([])).toEqual({ exitCode: 0, warnings: [] });
		expect(toRunResult([warning])).toEqual({ exitCode: 1, warnings: [warning] });
	});
});
