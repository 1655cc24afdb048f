// CHANGE: Application layer orchestration for the classifier CLI
// WHY: APP composes config loading, the pure CORE classifier and SHELL output
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; every AppError is reported on stderr and mapped to 1
// COMPLEXITY: O(n) where n = |compilerArgs|

import { Console, Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { formatError } from "../core/format/errors.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { classifyEffect } from "../shell/classifier/index.js";
import { loadClassifierConfig } from "../shell/config/index.js";
import { withLogging } from "../shell/logging/index.js";
import { printResult } from "../shell/output/index.js";

/**
 * Classify the compiler arguments named on the command line and print the report.
 *
 * @param cliOptions Parsed tool options
 * @param explicitConfig True when --config was given; a missing file is then an error
 *
 * @pure false (filesystem, stdout, stderr)
 * @effect Effect<ExitCode, never>
 */
export function runClassifier(
	cliOptions: CLIOptions,
	explicitConfig = false,
): Effect.Effect<ExitCode> {
	const program: Effect.Effect<ExitCode, AppError> = Effect.gen(function* () {
		const config = yield* loadClassifierConfig(
			cliOptions.configPath,
			explicitConfig,
		);
		const options = { ...config, dump: cliOptions.dump || config.dump === true };
		const result = yield* classifyEffect(cliOptions.compilerArgs, options);
		yield* printResult(result, cliOptions.format, options.defaultBinaryName);
		return computeExitCode(false);
	});

	return program.pipe(
		Effect.catchAll((error) =>
			Effect.as(Console.error(formatError(error)), computeExitCode(true)),
		),
		withLogging(cliOptions.logLevel),
	);
}
