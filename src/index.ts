// CHANGE: Public API entry point for library consumers
// WHY: Export CORE classification and derivation functions plus APP orchestration; SHELL internals stay hidden
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions or typed interfaces

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classify a compiler argv tail.
 *
 * @example
 * ```typescript
 * import { Either } from "effect";
 * import { classify, getOutputFilename } from "cc-argv-classifier";
 *
 * const result = classify(["-c", "foo.c"]);
 * if (Either.isRight(result)) {
 *   getOutputFilename(result.right); // Right("foo.o")
 * }
 * ```
 */
export {
	classify,
	classifyWithTables,
	isTerminal,
} from "./core/classifier/classify.js";
export {
	DEFAULT_BINARY_NAME,
	DEFAULT_EXACT_MATCHES,
	DEFAULT_PATTERN_MATCHES,
	GROUP_END,
	GROUP_START,
	patternRule,
	rule,
} from "./core/classifier/defaults.js";
export { buildRuleTables, validateRule } from "./core/classifier/rules.js";
export {
	getArtifactNames,
	getBitcodeFileName,
	getOutputFilename,
} from "./core/artifacts.js";
export { skipBitcodeGeneration } from "./core/decision.js";
export { formatDump } from "./core/format/dump.js";
export { formatError } from "./core/format/errors.js";
export {
	type ArtifactPair,
	type ClassificationReport,
	buildReport,
} from "./core/format/report.js";
export { emptyState } from "./core/models.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	type ClassificationError,
	ConfigError,
	InvalidRule,
	MalformedArity,
	NoInputFiles,
	OutOfContextFlag,
	OverlappingPatterns,
} from "./core/errors.js";
export type {
	BitcodeDecision,
	ClassificationFlags,
	ClassificationResult,
	ClassifierState,
	Diagnostic,
	DiagnosticLevel,
	ExitCode,
} from "./core/models.js";
export type {
	BuiltinActionTag,
	ClassifierOptions,
	CompiledPatternRule,
	PatternRule,
	Rule,
	RuleAction,
	RuleHandler,
	RuleTables,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// EFFECT INTEGRATION
// ═══════════════════════════════════════════════════════════════════════════════

export { runClassifier } from "./app/runClassifier.js";
export { classifyEffect } from "./shell/classifier/index.js";
export { loadClassifierConfig } from "./shell/config/index.js";
