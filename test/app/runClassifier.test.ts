// CHANGE: End-to-end specs for the APP layer without spawning a process
// WHY: runClassifier must map every outcome to an ExitCode value

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runClassifier } from "../../src/app/runClassifier.js";
import type { CLIOptions } from "../../src/core/types/index.js";
import { main } from "../../src/main.js";

describe("runClassifier", () => {
	let dir = "";

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "cc-classify-app-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	const options = (patch: Partial<CLIOptions>): CLIOptions => ({
		configPath: path.join(dir, "classifier.config.json"),
		format: "json",
		dump: false,
		logLevel: "error",
		compilerArgs: [],
		...patch,
	});

	it("prints a JSON report and exits 0", async () => {
		const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runClassifier(options({ compilerArgs: ["-c", "foo.c"] })),
		);
		expect(code).toBe(0);
		expect(stdout).toHaveBeenCalledTimes(1);
		const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
		expect(printed).toMatchObject({
			inputFiles: ["foo.c"],
			outputFilename: "foo.o",
			bitcodeFilename: ".foo.o.bc",
			bitcode: { skip: false },
		});
	});

	it("applies overrides from the configuration file", async () => {
		fs.writeFileSync(
			path.join(dir, "classifier.config.json"),
			JSON.stringify({ exactMatches: { "-I": { arity: 1, action: "Compile" } } }),
		);
		const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
		await Effect.runPromise(
			runClassifier(options({ compilerArgs: ["-I", "inc", "a.c"] })),
		);
		const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
		expect(printed).toMatchObject({ compileArgs: ["-I", "inc"] });
	});

	it("reports a malformed invocation on stderr and exits 1", async () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runClassifier(options({ compilerArgs: ["a.c", "-o"] })),
		);
		expect(code).toBe(1);
		expect(stderr).toHaveBeenCalledWith(
			'Flag "-o" expects 1 argument(s) but only 0 remain',
		);
	});

	it("fails when an explicit configuration file is missing", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const code = await Effect.runPromise(
			runClassifier(options({ compilerArgs: ["a.c"] }), true),
		);
		expect(code).toBe(1);
	});
});

describe("main", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("renders the text format", async () => {
		const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const code = await main([
			"--format",
			"text",
			"--log-level",
			"error",
			"--",
			"a.c",
			"-E",
			"b.c",
		]);
		expect(code).toBe(0);
		expect(stdout).toHaveBeenCalledWith(
			[
				"compileArgs: []",
				'inputFiles: ["a.c"]',
				"linkArgs: []",
				"objectFiles: []",
				"forbiddenArgs: []",
				"outputFilename: a.out",
				"a.c ===> (a.o, .a.o.bc)",
				"Flags:",
				"isVerbose = false",
				"isDependencyOnly = false",
				"isPreprocessOnly = true",
				"isAssembleOnly = false",
				"isAssembly = false",
				"isCompileOnly = false",
				"isEmitLLVM = false",
				"isStandardIn = false",
				"bitcode: skip (Preprocess only)",
			].join("\n"),
		);
	});

	it("exits 1 on invalid tool options", async () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
		expect(await main(["--format", "yaml"])).toBe(1);
		expect(stderr).toHaveBeenCalledWith(
			'--format expects one of json, text, got "yaml"',
		);
	});
});
