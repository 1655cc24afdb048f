// CHANGE: Pure decisions over a finished classification
// WHY: Centralize the skip-bitcode and exit-code logic in the Functional Core
// FORMAT THEOREM: skip(r) = true ↔ ∃ rule ∈ SKIP_RULES: rule.applies(r)
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Result → Decision
// COMPLEXITY: O(1) time / O(1) space

import type {
	BitcodeDecision,
	ClassificationResult,
	ExitCode,
} from "./models.js";

interface SkipRule {
	readonly applies: (result: ClassificationResult) => boolean;
	readonly reason: string;
}

const SKIP_RULES: readonly SkipRule[] = [
	{
		applies: (r) => r.inputFiles.length === 0,
		reason: "No input files",
	},
	{ applies: (r) => r.isEmitLLVM, reason: "Already emitting LLVM bitcode" },
	{ applies: (r) => r.isPreprocessOnly, reason: "Preprocess only" },
	{ applies: (r) => r.isAssembleOnly, reason: "Assemble only" },
	{ applies: (r) => r.isAssembly, reason: "Assembly source" },
	{
		applies: (r) => r.isDependencyOnly && !r.isCompileOnly,
		reason: "Dependency generation only",
	},
	{ applies: (r) => r.isStandardIn, reason: "Source read from standard input" },
];

/**
 * Decide whether the bitcode-emitting pass is pointless for this invocation.
 *
 * @returns first matching reason in SKIP_RULES order, or `{ skip: false }`
 *
 * @pure true
 * @complexity O(|SKIP_RULES|)
 */
export const skipBitcodeGeneration = (
	result: ClassificationResult,
): BitcodeDecision => {
	const hit = SKIP_RULES.find((r) => r.applies(result));
	return hit === undefined ? { skip: false } : { skip: true, reason: hit.reason };
};

/**
 * Exit code for a run that did or did not hit a fatal error.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 */
export const computeExitCode = (failed: boolean): ExitCode =>
	failed ? 1 : 0;
