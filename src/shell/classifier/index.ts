// CHANGE: Lift the pure classifier into Effect and replay its diagnostics
// WHY: CORE records diagnostics as data; SHELL owns logging and the dump side channel
// PURITY: SHELL
// EFFECT: Effect<ClassificationResult, ClassificationError | InvalidRule>
// INVARIANT: diagnostics are logged in the order the classifier recorded them
// COMPLEXITY: O(n) where n = |tokens|

import { Console, Effect } from "effect";

import { classify } from "../../core/classifier/classify.js";
import type { ClassificationError, InvalidRule } from "../../core/errors.js";
import { formatDump } from "../../core/format/dump.js";
import type { ClassificationResult, Diagnostic } from "../../core/models.js";
import type { ClassifierOptions } from "../../core/types/index.js";

export const logDiagnostics = (
	diagnostics: readonly Diagnostic[],
): Effect.Effect<void> =>
	Effect.forEach(
		diagnostics,
		(d) =>
			d.level === "warning"
				? Effect.logWarning(d.message)
				: Effect.logDebug(d.message),
		{ discard: true },
	);

/**
 * Classify tokens, log diagnostics, and dump the partitioning when asked.
 *
 * @pure false (logging, stderr)
 * @effect Effect<ClassificationResult, ClassificationError | InvalidRule>
 */
export function classifyEffect(
	tokens: readonly string[],
	options: ClassifierOptions = {},
): Effect.Effect<ClassificationResult, ClassificationError | InvalidRule> {
	return Effect.gen(function* () {
		const result = yield* classify(tokens, options);
		yield* logDiagnostics(result.diagnostics);
		if (options.dump === true) {
			yield* Console.error(
				formatDump(result, options.defaultBinaryName).join("\n"),
			);
		}
		return result;
	});
}
