import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	getArtifactNames,
	getBitcodeFileName,
	getOutputFilename,
} from "../../src/core/artifacts.js";
import { classify } from "../../src/core/classifier/classify.js";
import { NoInputFiles } from "../../src/core/errors.js";
import type { ClassificationResult } from "../../src/core/models.js";

const run = (tokens: readonly string[]): ClassificationResult =>
	Either.getOrThrow(classify(tokens));

describe("getOutputFilename", () => {
	it("prefers an explicit -o", () => {
		expect(getOutputFilename(run(["-c", "a.c", "-o", "obj/a.o"]))).toEqual(
			Either.right("obj/a.o"),
		);
	});

	it("derives <root>.o from the first input under -c", () => {
		expect(getOutputFilename(run(["-c", "foo.c"]))).toEqual(Either.right("foo.o"));
		expect(getOutputFilename(run(["-c", "src/x.cpp", "y.c"]))).toEqual(
			Either.right("x.o"),
		);
	});

	it("falls back to the default binary name when linking", () => {
		expect(getOutputFilename(run(["a.c"]))).toEqual(Either.right("a.out"));
		expect(getOutputFilename(run(["a.c"]), "a.exe")).toEqual(
			Either.right("a.exe"),
		);
	});

	it("fails for compile-only runs without inputs", () => {
		const outcome = getOutputFilename(run(["--version"]));
		expect(Either.isLeft(outcome)).toBe(true);
		if (Either.isLeft(outcome)) {
			expect(outcome.left).toBeInstanceOf(NoInputFiles);
		}
	});
});

describe("getBitcodeFileName", () => {
	it("hides the bitcode beside the output", () => {
		expect(getBitcodeFileName("out")).toBe(".out.bc");
		expect(getBitcodeFileName("build/foo.o")).toBe("build/.foo.o.bc");
		expect(getBitcodeFileName("/tmp/a.out")).toBe("/tmp/.a.out.bc");
	});

	it("keeps the directory part as written", () => {
		expect(getBitcodeFileName("./out")).toBe("./.out.bc");
		expect(getBitcodeFileName("../build/app")).toBe("../build/.app.bc");
	});
});

describe("getArtifactNames", () => {
	it("hides both artifacts when asked", () => {
		expect(getArtifactNames("dir/x.cpp", true)).toEqual([".x.o", ".x.o.bc"]);
	});

	it("keeps the object visible by default", () => {
		expect(getArtifactNames("src/main.c")).toEqual(["main.o", ".main.o.bc"]);
	});

	it("strips only the final extension", () => {
		expect(getArtifactNames("gen/parser.tab.c")).toEqual([
			"parser.tab.o",
			".parser.tab.o.bc",
		]);
		expect(getArtifactNames("Makefile")).toEqual(["Makefile.o", ".Makefile.o.bc"]);
	});
});
