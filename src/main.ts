// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runClassifier
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runClassifier } from "./app/runClassifier.js";
import { computeExitCode } from "./core/decision.js";
import { formatError } from "./core/format/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv Tool arguments (defaults to process.argv tail)
 * @returns ExitCode (0 | 1)
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		console.error(formatError(parsed.left));
		return computeExitCode(true);
	}
	return Effect.runPromise(
		runClassifier(parsed.right.options, parsed.right.explicitConfig),
	);
}
