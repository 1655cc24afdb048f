// CHANGE: Rule table types for the argument classifier
// WHY: Handlers are a closed tagged union dispatched exhaustively instead of free callbacks
// PURITY: CORE
// INVARIANT: arity ∈ ℕ; patterns are ordered and matched against the whole token

import type { ClassifierState } from "../models.js";

/**
 * Caller-supplied handler for the `Custom` action.
 *
 * Must return a new state, never mutate the one it receives, and never drop
 * entries already recorded in `inputFiles`.
 */
export type RuleHandler = (
	state: ClassifierState,
	flag: string,
	args: readonly string[],
) => ClassifierState;

/**
 * Names of the built-in actions, in the order they are documented.
 */
export const BUILTIN_ACTIONS = [
	"StandardIn",
	"OutputFile",
	"CompileOnly",
	"PreprocessOnly",
	"AssembleOnly",
	"Verbose",
	"EmitLLVM",
	"DependencyOnly",
	"InputFile",
	"ObjectFile",
	"Compile",
	"Link",
	"CompileAndLink",
	"Forbidden",
	"Ignore",
	"Abort",
] as const;

export type BuiltinActionTag = (typeof BUILTIN_ACTIONS)[number];

/**
 * What a matched rule does with its flag and consumed arguments.
 */
export type RuleAction =
	| { readonly [K in BuiltinActionTag]: { readonly _tag: K } }[BuiltinActionTag]
	| { readonly _tag: "Custom"; readonly handler: RuleHandler };

/**
 * @property arity Number of tokens after the flag that belong to it
 * @property action Handler variant applied to the flag and its arguments
 */
export interface Rule {
	readonly arity: number;
	readonly action: RuleAction;
}

/**
 * Rule keyed by a regular expression; the whole token must match.
 */
export interface PatternRule extends Rule {
	readonly pattern: RegExp;
}

/**
 * Pattern rule with its whole-token matcher precompiled.
 *
 * @invariant anchored ≡ ^(?:pattern)$ with the same flags
 */
export interface CompiledPatternRule extends PatternRule {
	readonly anchored: RegExp;
}

/**
 * Resolved rule tables used by a classification run.
 *
 * @invariant patterns preserve declaration order
 */
export interface RuleTables {
	readonly exact: ReadonlyMap<string, Rule>;
	readonly patterns: readonly CompiledPatternRule[];
}

/**
 * Caller overrides and switches accepted by the classifier.
 *
 * @property exactMatches Replace or add exact rules by literal key
 * @property patternMatches Replace (same source and flags) or append pattern rules
 * @property dump Render the partitioning to stderr after a run
 * @property defaultBinaryName Output name when neither `-o` nor `-c` is given
 */
export interface ClassifierOptions {
	readonly exactMatches?: Readonly<Record<string, Rule>>;
	readonly patternMatches?: readonly PatternRule[];
	readonly dump?: boolean;
	readonly defaultBinaryName?: string;
}
