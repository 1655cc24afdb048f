// CHANGE: Rule-driven classification of a compiler argument list
// WHY: The wrapper needs compile, link and file partitions before deciding on a bitcode pass
// PURITY: CORE
// FORMAT THEOREM: ∀tokens: Right(r) ⇒ each token is a matched flag, a consumed argument or a compileArgs default, exactly once, until a terminal flag
// INVARIANT: exact rules win over pattern rules; a token matching two patterns is rejected
// COMPLEXITY: O(n · p) where n = |tokens|, p = |patterns|

import { Either, Option } from "effect";

import {
	type ClassificationError,
	type InvalidRule,
	OverlappingPatterns,
} from "../errors.js";
import {
	type ClassificationFlags,
	type ClassificationResult,
	emptyState,
} from "../models.js";
import type { ClassifierOptions, Rule, RuleTables } from "../types/rules.js";
import { applyAction } from "./actions.js";
import {
	applyDelta,
	type ClassifierDraft,
	draftFrom,
	freeze,
	record,
	replaceWith,
} from "./draft.js";
import { GROUP_END, GROUP_START } from "./defaults.js";
import { buildRuleTables, patternKey } from "./rules.js";
import { makeQueue, pop, type TokenQueue, take, takeUntil } from "./token-queue.js";

type Step = Either.Either<TokenQueue, ClassificationError>;

/**
 * Preprocess-only and assemble-only runs never reach a second phase.
 *
 * @pure true
 */
export const isTerminal = (flags: ClassificationFlags): boolean =>
	flags.isPreprocessOnly || flags.isAssembleOnly;

function applyRule(
	draft: ClassifierDraft,
	matched: Rule,
	flag: string,
	queue: TokenQueue,
): Step {
	return Either.flatMap(take(queue, matched.arity, flag), ([args, next]) =>
		Either.map(
			applyAction(matched.action, flag, args, draft.inputList),
			(transition) => {
				if (transition._tag === "Delta") {
					applyDelta(draft, transition.delta);
				} else {
					record(draft, transition.notes);
					replaceWith(draft, transition.handler(freeze(draft), flag, args));
				}
				return next;
			},
		),
	);
}

function linkingGroup(draft: ClassifierDraft, queue: TokenQueue): Step {
	const group = takeUntil(queue, GROUP_END);
	const members = [GROUP_START, ...group.taken];
	applyDelta(draft, {
		notes: [
			{ level: "debug", message: `linkingGroup: ${members.join(" ")}` },
			...(group.terminated
				? []
				: [
						{
							level: "warning" as const,
							message: `Did not find a closing "${GROUP_END}" to match "${GROUP_START}"`,
						},
					]),
		],
		appends: [["linkArgs", members]],
	});
	return Either.right(group.queue);
}

function classifyToken(
	tables: RuleTables,
	draft: ClassifierDraft,
	token: string,
	queue: TokenQueue,
): Step {
	if (token === GROUP_START) {
		return linkingGroup(draft, queue);
	}
	const exact = tables.exact.get(token);
	if (exact !== undefined) {
		return applyRule(draft, exact, token, queue);
	}
	const matches = tables.patterns.filter((p) => p.anchored.test(token));
	const [first, ...others] = matches;
	if (first === undefined) {
		applyDelta(draft, {
			notes: [
				{
					level: "warning",
					message: `Did not recognize the compiler flag "${token}"`,
				},
			],
			appends: [["compileArgs", [token]]],
		});
		return Either.right(queue);
	}
	if (others.length > 0) {
		return Either.left(
			new OverlappingPatterns({
				token,
				patterns: matches.map((p) => patternKey(p.pattern)),
			}),
		);
	}
	return applyRule(draft, first, token, queue);
}

/**
 * Classify tokens against already-built rule tables.
 *
 * @param tables Rule tables from {@link buildRuleTables}
 * @param tokens Compiler argv tail (program name excluded)
 * @returns Finished result, or the first fatal classification error
 *
 * @pure true
 * @invariant result.inputList === tokens
 * @complexity O(n · p)
 */
export function classifyWithTables(
	tables: RuleTables,
	tokens: readonly string[],
): Either.Either<ClassificationResult, ClassificationError> {
	const draft = draftFrom(emptyState(tokens));
	let queue = makeQueue(tokens);
	while (!isTerminal(draft.flags)) {
		const next = pop(queue);
		if (Option.isNone(next)) break;
		const [token, after] = next.value;
		const step = classifyToken(tables, draft, token, after);
		if (Either.isLeft(step)) return Either.left(step.left);
		queue = step.right;
	}
	return Either.right(freeze(draft));
}

/**
 * Classify a compiler invocation's arguments.
 *
 * @example
 * ```ts
 * const result = classify(["-c", "foo.c"]);
 * // Right({ inputFiles: ["foo.c"], isCompileOnly: true, ... })
 * ```
 *
 * @pure true
 */
export const classify = (
	tokens: readonly string[],
	options: ClassifierOptions = {},
): Either.Either<ClassificationResult, ClassificationError | InvalidRule> =>
	Either.flatMap(buildRuleTables(options), (tables) =>
		classifyWithTables(tables, tokens),
	);
