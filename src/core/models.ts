// CHANGE: Introduce Functional Core domain models for argument classification
// WHY: CORE contains only immutable data and the invariants the classifier relies on
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable once a run finishes
// COMPLEXITY: O(1)

/**
 * Exit code for the classifier process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Severity of a non-fatal diagnostic recorded during classification.
 */
export type DiagnosticLevel = "debug" | "warning";

/**
 * Non-fatal diagnostic produced by the pure classifier.
 *
 * @remarks
 * The core never logs; the shell replays these through the Effect logger.
 */
export interface Diagnostic {
	readonly level: DiagnosticLevel;
	readonly message: string;
}

/**
 * Boolean switches recorded while classifying an invocation.
 */
export interface ClassificationFlags {
	readonly isVerbose: boolean;
	readonly isDependencyOnly: boolean;
	readonly isPreprocessOnly: boolean;
	readonly isAssembleOnly: boolean;
	readonly isAssembly: boolean;
	readonly isCompileOnly: boolean;
	readonly isEmitLLVM: boolean;
	readonly isStandardIn: boolean;
}

/**
 * Partitioned view of one compiler invocation.
 *
 * @remarks
 * - @pure true
 * - @invariant every accumulator preserves the order tokens appeared in
 * - @invariant inputFiles only grows during a run
 */
export interface ClassificationResult extends ClassificationFlags {
	readonly inputList: readonly string[];
	readonly inputFiles: readonly string[];
	readonly objectFiles: readonly string[];
	readonly compileArgs: readonly string[];
	readonly linkArgs: readonly string[];
	readonly forbiddenArgs: readonly string[];
	readonly outputFilename: string | undefined;
	readonly diagnostics: readonly Diagnostic[];
}

/**
 * State threaded through rule handlers.
 *
 * Handlers receive the current state and return the next one; the shape is
 * identical to the finished result so a run can hand its last state out as is.
 */
export type ClassifierState = ClassificationResult;

/**
 * Outcome of asking whether the bitcode pass can be skipped.
 */
export type BitcodeDecision =
	| { readonly skip: true; readonly reason: string }
	| { readonly skip: false };

/**
 * Initial classifier state for a token list.
 *
 * @pure true
 * @postcondition all accumulators are empty and every flag is false
 * @complexity O(1)
 */
export const emptyState = (inputList: readonly string[]): ClassifierState => ({
	inputList,
	inputFiles: [],
	objectFiles: [],
	compileArgs: [],
	linkArgs: [],
	forbiddenArgs: [],
	outputFilename: undefined,
	diagnostics: [],
	isVerbose: false,
	isDependencyOnly: false,
	isPreprocessOnly: false,
	isAssembleOnly: false,
	isAssembly: false,
	isCompileOnly: false,
	isEmitLLVM: false,
	isStandardIn: false,
});
