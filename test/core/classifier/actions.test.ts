import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	applyAction,
	type Delta,
	type Transition,
} from "../../../src/core/classifier/actions.js";
import {
	applyDelta,
	draftFrom,
	freeze,
} from "../../../src/core/classifier/draft.js";
import { OutOfContextFlag } from "../../../src/core/errors.js";
import { type ClassifierState, emptyState } from "../../../src/core/models.js";
import type { RuleAction } from "../../../src/core/types/index.js";

const transitionOf = (
	action: RuleAction,
	flag: string,
	args: readonly string[] = [],
): Transition => Either.getOrThrow(applyAction(action, flag, args, []));

const deltaOf = (
	action: RuleAction,
	flag: string,
	args: readonly string[] = [],
): Delta => {
	const transition = transitionOf(action, flag, args);
	if (transition._tag !== "Delta") {
		throw new Error(`expected a delta for ${action._tag}`);
	}
	return transition.delta;
};

const apply = (
	action: RuleAction,
	flag: string,
	args: readonly string[] = [],
): ClassifierState => {
	const draft = draftFrom(emptyState([]));
	applyDelta(draft, deltaOf(action, flag, args));
	return freeze(draft);
};

describe("applyAction", () => {
	it("records a debug trace for every action", () => {
		expect(apply({ _tag: "CompileOnly" }, "-c").diagnostics).toEqual([
			{ level: "debug", message: "CompileOnly: -c" },
		]);
	});

	it("OutputFile stores the first argument", () => {
		expect(apply({ _tag: "OutputFile" }, "-o", ["prog"]).outputFilename).toBe(
			"prog",
		);
	});

	it("EmitLLVM also marks the run compile-only", () => {
		const state = apply({ _tag: "EmitLLVM" }, "-emit-llvm");
		expect(state.isEmitLLVM).toBe(true);
		expect(state.isCompileOnly).toBe(true);
	});

	it("DependencyOnly keeps the flag and its argument for the compile phase", () => {
		const state = apply({ _tag: "DependencyOnly" }, "-MF", ["deps.d"]);
		expect(state.isDependencyOnly).toBe(true);
		expect(state.compileArgs).toEqual(["-MF", "deps.d"]);
	});

	it("InputFile flags assembly sources", () => {
		expect(apply({ _tag: "InputFile" }, "start.S").isAssembly).toBe(true);
		expect(apply({ _tag: "InputFile" }, "main.c").isAssembly).toBe(false);
		expect(apply({ _tag: "InputFile" }, "main.c").inputFiles).toEqual([
			"main.c",
		]);
	});

	it("CompileAndLink appends to both phases", () => {
		const state = apply({ _tag: "CompileAndLink" }, "--coverage");
		expect(state.compileArgs).toEqual(["--coverage"]);
		expect(state.linkArgs).toEqual(["--coverage"]);
	});

	it("Link keeps flag and argument together", () => {
		expect(apply({ _tag: "Link" }, "-L", ["/opt/lib"]).linkArgs).toEqual([
			"-L",
			"/opt/lib",
		]);
	});

	it("Forbidden warns and strips the flag from both phases", () => {
		const state = apply({ _tag: "Forbidden" }, "-O3");
		expect(state.forbiddenArgs).toEqual(["-O3"]);
		expect(state.compileArgs).toEqual([]);
		expect(state.linkArgs).toEqual([]);
		expect(state.diagnostics).toEqual([
			{ level: "debug", message: "Forbidden: -O3" },
			{
				level: "warning",
				message:
					'The flag "-O3" cannot be used with this tool; we are ignoring it',
			},
		]);
	});

	it("Ignore records the pair as ignored", () => {
		const state = apply({ _tag: "Ignore" }, "-Xclang", ["-disable-O0-optnone"]);
		expect(state.forbiddenArgs).toEqual(["-Xclang", "-disable-O0-optnone"]);
		expect(state.diagnostics[1]).toEqual({
			level: "warning",
			message: 'Ignoring compiler arg pair: "-Xclang -disable-O0-optnone"',
		});
	});

	it("Custom hands the caller handler over with its trace", () => {
		const handler = (s: ClassifierState): ClassifierState => s;
		expect(transitionOf({ _tag: "Custom", handler }, "-Wl", ["x"])).toEqual({
			_tag: "Rewrite",
			notes: [{ level: "debug", message: "Custom: -Wl x" }],
			handler,
		});
	});

	it("Abort fails with OutOfContextFlag", () => {
		const outcome = applyAction({ _tag: "Abort" }, "-bad", [], ["-bad"]);
		expect(Either.isLeft(outcome)).toBe(true);
		if (Either.isLeft(outcome)) {
			expect(outcome.left).toBeInstanceOf(OutOfContextFlag);
			expect(outcome.left.inputList).toEqual(["-bad"]);
		}
	});
});

describe("draft", () => {
	it("freezes a snapshot later deltas do not reach", () => {
		const draft = draftFrom(emptyState(["a.o", "b.o"]));
		applyDelta(draft, { appends: [["objectFiles", ["a.o"]]] });
		const first = freeze(draft);
		applyDelta(draft, {
			appends: [["objectFiles", ["b.o"]]],
			flags: { isVerbose: true },
		});
		expect(first.objectFiles).toEqual(["a.o"]);
		expect(first.isVerbose).toBe(false);
		expect(freeze(draft).objectFiles).toEqual(["a.o", "b.o"]);
		expect(freeze(draft).isVerbose).toBe(true);
	});
});
