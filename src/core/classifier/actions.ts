// CHANGE: Exhaustive dispatch from rule actions to state deltas
// WHY: Actions describe what to record; the classification run owns the buffers and applies them
// PURITY: CORE
// FORMAT THEOREM: ∀a ∈ RuleAction \ {Abort, Custom}: delta(a, f, xs) names only the accumulators and flags a touches
// INVARIANT: inputFiles only grows; every consumed token lands in at most one accumulator
// COMPLEXITY: O(|args|) per application

import { Either } from "effect";
import { match } from "ts-pattern";

import { OutOfContextFlag } from "../errors.js";
import type { ClassificationFlags, Diagnostic } from "../models.js";
import type { RuleAction, RuleHandler } from "../types/rules.js";

export type Accumulator =
	| "inputFiles"
	| "objectFiles"
	| "compileArgs"
	| "linkArgs"
	| "forbiddenArgs";

/**
 * Changes one action makes to the running classification.
 *
 * @property flags Switches to turn on
 * @property outputFilename Replacement for the `-o` target
 * @property appends Values appended to accumulators, in order
 * @property notes Diagnostics appended, in order
 */
export interface Delta {
	readonly flags?: Partial<ClassificationFlags>;
	readonly outputFilename?: string;
	readonly appends?: ReadonlyArray<readonly [Accumulator, readonly string[]]>;
	readonly notes?: readonly Diagnostic[];
}

/**
 * A built-in action yields a delta; `Custom` hands the whole state to the
 * caller's handler after its notes are recorded.
 */
export type Transition =
	| { readonly _tag: "Delta"; readonly delta: Delta }
	| {
			readonly _tag: "Rewrite";
			readonly notes: readonly Diagnostic[];
			readonly handler: RuleHandler;
	  };

type AppliedAction = Exclude<RuleAction, { readonly _tag: "Abort" }>;

const ASSEMBLY_SOURCE = /\.(s|S)$/;

const debug = (message: string): Diagnostic => ({ level: "debug", message });
const warning = (message: string): Diagnostic => ({ level: "warning", message });

const render = (flag: string, args: readonly string[]): string =>
	[flag, ...args].join(" ");

/**
 * Resolve a rule action into the transition the run applies.
 *
 * @param flag Token that matched the rule
 * @param args Tokens consumed on behalf of the flag
 * @param inputList Full token list, reported by `Abort`
 * @returns Transition, or Left(OutOfContextFlag) for `Abort`
 *
 * @pure true
 * @complexity O(|args|)
 */
export function applyAction(
	action: RuleAction,
	flag: string,
	args: readonly string[],
	inputList: readonly string[],
): Either.Either<Transition, OutOfContextFlag> {
	if (action._tag === "Abort") {
		return Either.left(new OutOfContextFlag({ flag, inputList }));
	}
	const trace = debug(`${action._tag}: ${render(flag, args)}`);
	return Either.right(transition(trace, action, flag, args));
}

function transition(
	trace: Diagnostic,
	action: AppliedAction,
	flag: string,
	args: readonly string[],
): Transition {
	const withFlag = [flag, ...args];
	const delta = (change: Delta = {}): Transition => ({
		_tag: "Delta",
		delta: { ...change, notes: [trace, ...(change.notes ?? [])] },
	});
	return match<AppliedAction, Transition>(action)
		.with({ _tag: "StandardIn" }, () => delta({ flags: { isStandardIn: true } }))
		.with({ _tag: "OutputFile" }, () => {
			const [target] = args;
			return delta(target === undefined ? {} : { outputFilename: target });
		})
		.with({ _tag: "CompileOnly" }, () => delta({ flags: { isCompileOnly: true } }))
		.with({ _tag: "PreprocessOnly" }, () =>
			delta({ flags: { isPreprocessOnly: true } }),
		)
		.with({ _tag: "AssembleOnly" }, () =>
			delta({ flags: { isAssembleOnly: true } }),
		)
		.with({ _tag: "Verbose" }, () => delta({ flags: { isVerbose: true } }))
		.with({ _tag: "EmitLLVM" }, () =>
			delta({ flags: { isEmitLLVM: true, isCompileOnly: true } }),
		)
		.with({ _tag: "DependencyOnly" }, () =>
			delta({
				flags: { isDependencyOnly: true },
				appends: [["compileArgs", withFlag]],
			}),
		)
		.with({ _tag: "InputFile" }, () =>
			delta({
				flags: ASSEMBLY_SOURCE.test(flag) ? { isAssembly: true } : {},
				appends: [["inputFiles", [flag]]],
			}),
		)
		.with({ _tag: "ObjectFile" }, () =>
			delta({ appends: [["objectFiles", [flag]]] }),
		)
		.with({ _tag: "Compile" }, () =>
			delta({ appends: [["compileArgs", withFlag]] }),
		)
		.with({ _tag: "Link" }, () => delta({ appends: [["linkArgs", withFlag]] }))
		.with({ _tag: "CompileAndLink" }, () =>
			delta({
				appends: [
					["compileArgs", withFlag],
					["linkArgs", withFlag],
				],
			}),
		)
		.with({ _tag: "Forbidden" }, () =>
			delta({
				notes: [
					warning(
						`The flag "${flag}" cannot be used with this tool; we are ignoring it`,
					),
				],
				appends: [["forbiddenArgs", withFlag]],
			}),
		)
		.with({ _tag: "Ignore" }, () =>
			delta({
				notes: [warning(`Ignoring compiler arg pair: "${render(flag, args)}"`)],
				appends: [["forbiddenArgs", withFlag]],
			}),
		)
		.with({ _tag: "Custom" }, (a): Transition => ({
			_tag: "Rewrite",
			notes: [trace],
			handler: a.handler,
		}))
		.exhaustive();
}
