import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { classify } from "../../src/core/classifier/classify.js";
import { rule } from "../../src/core/classifier/defaults.js";
import { computeExitCode, skipBitcodeGeneration } from "../../src/core/decision.js";
import type { ClassifierOptions } from "../../src/core/types/index.js";

const decide = (tokens: readonly string[], options?: ClassifierOptions) =>
	skipBitcodeGeneration(Either.getOrThrow(classify(tokens, options)));

describe("skipBitcodeGeneration", () => {
	it("emits bitcode for an ordinary compile", () => {
		expect(decide(["-c", "a.c"])).toEqual({ skip: false });
	});

	it("skips link-only and query invocations", () => {
		expect(decide(["a.o", "-lm"])).toEqual({ skip: true, reason: "No input files" });
		expect(decide(["--version"])).toEqual({ skip: true, reason: "No input files" });
	});

	it("skips preprocess-only and assemble-only runs", () => {
		expect(decide(["a.c", "-E"])).toEqual({ skip: true, reason: "Preprocess only" });
		expect(decide(["a.c", "-S"])).toEqual({ skip: true, reason: "Assemble only" });
	});

	it("skips assembly sources", () => {
		expect(decide(["-c", "boot.s"])).toEqual({ skip: true, reason: "Assembly source" });
	});

	it("skips standard input", () => {
		expect(decide(["-", "a.c"])).toEqual({
			skip: true,
			reason: "Source read from standard input",
		});
	});

	it("skips dependency generation unless compiling too", () => {
		const options = { exactMatches: { "-M": rule("DependencyOnly") } };
		expect(decide(["-M", "a.c"], options)).toEqual({
			skip: true,
			reason: "Dependency generation only",
		});
		expect(decide(["-M", "-c", "a.c"], options)).toEqual({ skip: false });
	});

	it("skips runs that already emit bitcode", () => {
		expect(
			decide(["-emit-llvm", "a.c"], {
				exactMatches: { "-emit-llvm": rule("EmitLLVM") },
			}),
		).toEqual({ skip: true, reason: "Already emitting LLVM bitcode" });
	});
});

describe("computeExitCode", () => {
	it("maps failure to 1 and success to 0", () => {
		expect(computeExitCode(true)).toBe(1);
		expect(computeExitCode(false)).toBe(0);
	});
});
