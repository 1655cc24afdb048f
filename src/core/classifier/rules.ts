// CHANGE: Merge caller overrides into the default rule tables
// WHY: Overrides shadow defaults by key; defaults are never dropped silently
// PURITY: CORE
// FORMAT THEOREM: ∀k ∈ keys(defaults) ∪ keys(overrides): tables(k) = overrides(k) ?? defaults(k)
// INVARIANT: pattern order = defaults order (replaced in place) ++ new overrides order
// COMPLEXITY: O(d + o) where d = |defaults|, o = |overrides|

import { Either } from "effect";

import { InvalidRule } from "../errors.js";
import type {
	ClassifierOptions,
	CompiledPatternRule,
	PatternRule,
	Rule,
	RuleTables,
} from "../types/rules.js";
import { DEFAULT_EXACT_MATCHES, DEFAULT_PATTERN_MATCHES } from "./defaults.js";

/**
 * Identity of a pattern rule: source plus flags.
 */
export const patternKey = (pattern: RegExp): string =>
	`/${pattern.source}/${pattern.flags}`;

/**
 * Check that a rule can be applied.
 *
 * @pure true
 * @invariant Right(rule) ⇒ rule.arity ∈ ℕ ∧ (OutputFile ⇒ arity ≥ 1)
 */
export function validateRule<R extends Rule>(
	key: string,
	candidate: R,
): Either.Either<R, InvalidRule> {
	if (!Number.isSafeInteger(candidate.arity) || candidate.arity < 0) {
		return Either.left(
			new InvalidRule({
				key,
				detail: `arity must be a non-negative integer, got ${String(candidate.arity)}`,
			}),
		);
	}
	if (candidate.action._tag === "OutputFile" && candidate.arity < 1) {
		return Either.left(
			new InvalidRule({ key, detail: "OutputFile needs an arity of at least 1" }),
		);
	}
	return Either.right(candidate);
}

const compilePattern = (
	candidate: PatternRule,
): Either.Either<CompiledPatternRule, InvalidRule> => {
	const key = patternKey(candidate.pattern);
	const { global, sticky, multiline } = candidate.pattern;
	if (global || sticky) {
		return Either.left(
			new InvalidRule({ key, detail: "global and sticky patterns keep state between matches" }),
		);
	}
	if (multiline) {
		return Either.left(
			new InvalidRule({ key, detail: "multiline patterns match single lines, not whole tokens" }),
		);
	}
	return Either.map(validateRule(key, candidate), (valid) => ({
		...valid,
		anchored: new RegExp(`^(?:${valid.pattern.source})$`, valid.pattern.flags),
	}));
};

function mergePatterns(
	overrides: readonly PatternRule[],
): readonly PatternRule[] {
	const byKey = new Map(overrides.map((p) => [patternKey(p.pattern), p]));
	const merged = DEFAULT_PATTERN_MATCHES.map(
		(p) => byKey.get(patternKey(p.pattern)) ?? p,
	);
	const defaultKeys = new Set(
		DEFAULT_PATTERN_MATCHES.map((p) => patternKey(p.pattern)),
	);
	const added = [...byKey.values()].filter(
		(p) => !defaultKeys.has(patternKey(p.pattern)),
	);
	return [...merged, ...added];
}

/**
 * Build the rule tables for a run from defaults and caller overrides.
 *
 * @returns Left(InvalidRule) for the first override that cannot be applied
 *
 * @pure true
 * @complexity O(d + o)
 */
export function buildRuleTables(
	options: ClassifierOptions = {},
): Either.Either<RuleTables, InvalidRule> {
	const exactOverrides = Object.entries(options.exactMatches ?? {});
	const validatedExact = Either.all(
		exactOverrides.map(([key, r]) =>
			Either.map(validateRule(key, r), (valid): [string, Rule] => [key, valid]),
		),
	);
	const compiledPatterns = Either.all(
		mergePatterns(options.patternMatches ?? []).map(compilePattern),
	);
	return Either.zipWith(validatedExact, compiledPatterns, (exact, patterns) => ({
		exact: new Map([...DEFAULT_EXACT_MATCHES, ...exact]),
		patterns,
	}));
}
