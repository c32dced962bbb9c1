import { Option } from "effect";
import { describe, expect, it } from "vitest";

import { describeError } from "../../../src/core/errors.js";
import { createMemoryOpener } from "../../../src/shell/input/memory-sources.js";
import { decode, run, runFailure } from "../../utils/builders.js";

describe("createMemoryOpener", () => {
	it("labels standard input as stdin", () => {
		const source = run(createMemoryOpener({ "-": "x" }).open("-"));
		expect(source.label).toBe("stdin");
	});

	it("delivers contents in chunks, then none", () => {
		const source = run(createMemoryOpener({ "a.txt": "hello" }, { chunkSize: 2 }).open("a.txt"));
		const chunks: string[] = [];
		for (;;) {
			const chunk = run(source.read());
			if (Option.isNone(chunk)) break;
			chunks.push(decode(chunk.value));
		}
		expect(chunks).toEqual(["he", "ll", "o"]);
	});

	it("fails to open unknown names", () => {
		const error = runFailure(createMemoryOpener({}).open("nope"));
		expect(describeError(error)).toBe("nope: No such file or directory");
	});

	it("does not treat inherited properties as entries", () => {
		const error = runFailure(createMemoryOpener({}).open("toString"));
		expect(error._tag).toBe("SourceOpenFailed");
	});

	it("fails the read after the last chunk and the close when asked to", () => {
		const opener = createMemoryOpener({
			bad: { contents: "ab", failRead: "Input/output error", failClose: "Bad file descriptor" },
		});
		const source = run(opener.open("bad"));
		expect(Option.isSome(run(source.read()))).toBe(true);
		expect(describeError(runFailure(source.read()))).toBe("bad: Input/output error");
		expect(describeError(runFailure(source.close()))).toBe("bad: Bad file descriptor");
	});
});
