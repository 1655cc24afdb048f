// CHANGE: Introduce typed domain error ADT for the classifier using Effect.Data
// WHY: Fatal classification and configuration failures are values discriminated by `_tag`
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A flag asked for more trailing tokens than the invocation still holds.
 *
 * @pure true (Data class)
 * @invariant available < expected
 * @complexity O(1)
 */
export class MalformedArity extends Data.TaggedError("MalformedArity")<{
	readonly flag: string;
	readonly expected: number;
	readonly available: number;
}> {}

/**
 * A token fully matched two or more pattern rules.
 *
 * @pure true (Data class)
 * @invariant patterns.length >= 2
 * @complexity O(1)
 */
export class OverlappingPatterns extends Data.TaggedError(
	"OverlappingPatterns",
)<{
	readonly token: string;
	readonly patterns: readonly string[];
}> {}

/**
 * A rule bound to the `Abort` action was hit.
 *
 * @pure true (Data class)
 */
export class OutOfContextFlag extends Data.TaggedError("OutOfContextFlag")<{
	readonly flag: string;
	readonly inputList: readonly string[];
}> {}

/**
 * A rule definition cannot be used (bad arity, missing argument slot).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidRule extends Data.TaggedError("InvalidRule")<{
	readonly key: string;
	readonly detail: string;
}> {}

/**
 * A compile-only invocation has no input file to derive an object name from.
 *
 * @pure true (Data class)
 */
export class NoInputFiles extends Data.TaggedError("NoInputFiles")<{
	readonly detail: string;
}> {}

/**
 * Configuration file could not be read or does not have the expected shape.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Errors that abort a classification run.
 */
export type ClassificationError =
	| MalformedArity
	| OverlappingPatterns
	| OutOfContextFlag;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ClassificationError
	| InvalidRule
	| NoInputFiles
	| ConfigError;
