// CHANGE: Render a classification as human-readable text
// WHY: The dump switch and the CLI text format share one pure formatter
// PURITY: CORE
// INVARIANT: Output depends only on the result; no I/O
// COMPLEXITY: O(n) where n = total tokens across accumulators

import { Either } from "effect";

import { getArtifactNames, getOutputFilename } from "../artifacts.js";
import type { ClassificationFlags, ClassificationResult } from "../models.js";

const FLAG_NAMES: readonly (keyof ClassificationFlags)[] = [
	"isVerbose",
	"isDependencyOnly",
	"isPreprocessOnly",
	"isAssembleOnly",
	"isAssembly",
	"isCompileOnly",
	"isEmitLLVM",
	"isStandardIn",
];

const list = (values: readonly string[]): string =>
	`[${values.map((v) => JSON.stringify(v)).join(", ")}]`;

/**
 * Format the partitioning of an invocation.
 *
 * @example
 * ```ts
 * formatDump(result).join("\n");
 * // compileArgs: ["-Wall"]
 * // inputFiles: ["a.c"]
 * // ...
 * ```
 *
 * @pure true
 */
export function formatDump(
	result: ClassificationResult,
	defaultBinaryName?: string,
): readonly string[] {
	const output = Either.match(getOutputFilename(result, defaultBinaryName), {
		onLeft: (error) => `<${error.detail}>`,
		onRight: (name) => name,
	});
	return [
		`compileArgs: ${list(result.compileArgs)}`,
		`inputFiles: ${list(result.inputFiles)}`,
		`linkArgs: ${list(result.linkArgs)}`,
		`objectFiles: ${list(result.objectFiles)}`,
		`forbiddenArgs: ${list(result.forbiddenArgs)}`,
		`outputFilename: ${output}`,
		...result.inputFiles.map((src) => {
			const [objectName, bitcodeName] = getArtifactNames(src);
			return `${src} ===> (${objectName}, ${bitcodeName})`;
		}),
		"Flags:",
		...FLAG_NAMES.map((name) => `${name} = ${String(result[name])}`),
	];
}
