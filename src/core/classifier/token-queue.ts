// CHANGE: Explicit cursor over the remaining compiler arguments
// WHY: Arity consumption must be testable without mutating the caller's list
// PURITY: CORE
// FORMAT THEOREM: ∀q, n ≤ remaining(q): take(q, n) = (tokens[i..i+n), q with i+n)
// INVARIANT: index ∈ [0, |tokens|]; tokens is never mutated
// COMPLEXITY: O(1) per pop, O(n) per take

import { Either, Option } from "effect";

import { MalformedArity } from "../errors.js";

/**
 * Immutable view of a token list with a read position.
 */
export interface TokenQueue {
	readonly tokens: readonly string[];
	readonly index: number;
}

export const makeQueue = (tokens: readonly string[]): TokenQueue => ({
	tokens,
	index: 0,
});

/**
 * Number of tokens not yet consumed.
 *
 * @pure true
 * @invariant result >= 0
 */
export const remaining = (queue: TokenQueue): number =>
	queue.tokens.length - queue.index;

export const isEmpty = (queue: TokenQueue): boolean => remaining(queue) === 0;

/**
 * Tokens not yet consumed, in order.
 */
export const rest = (queue: TokenQueue): readonly string[] =>
	queue.tokens.slice(queue.index);

/**
 * Pop the front token.
 *
 * @pure true
 * @postcondition Some([t, q']) ⇒ q'.index = q.index + 1
 */
export const pop = (
	queue: TokenQueue,
): Option.Option<readonly [string, TokenQueue]> => {
	const token = queue.tokens[queue.index];
	return token === undefined
		? Option.none()
		: Option.some([token, { ...queue, index: queue.index + 1 }] as const);
};

/**
 * Consume exactly `count` tokens on behalf of `flag`.
 *
 * @returns Left(MalformedArity) when fewer than `count` tokens remain
 *
 * @pure true
 * @invariant on Right, |taken| = count
 * @complexity O(count)
 */
export const take = (
	queue: TokenQueue,
	count: number,
	flag: string,
): Either.Either<readonly [readonly string[], TokenQueue], MalformedArity> => {
	const available = remaining(queue);
	if (count > available) {
		return Either.left(
			new MalformedArity({ flag, expected: count, available }),
		);
	}
	const end = queue.index + count;
	return Either.right([
		queue.tokens.slice(queue.index, end),
		{ ...queue, index: end },
	] as const);
};

/**
 * Result of consuming up to (and including) a closing marker.
 */
export interface TakeUntilResult {
	readonly taken: readonly string[];
	readonly queue: TokenQueue;
	readonly terminated: boolean;
}

/**
 * Consume tokens up to and including `marker`, or every remaining token.
 *
 * @pure true
 * @postcondition terminated ⇒ taken ends with marker
 * @complexity O(k) where k = |taken|
 */
export const takeUntil = (
	queue: TokenQueue,
	marker: string,
): TakeUntilResult => {
	const offset = rest(queue).indexOf(marker);
	const end = offset === -1 ? queue.tokens.length : queue.index + offset + 1;
	return {
		taken: queue.tokens.slice(queue.index, end),
		queue: { ...queue, index: end },
		terminated: offset !== -1,
	};
};
