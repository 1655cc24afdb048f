// CHANGE: Derive artifact names from a finished classification
// WHY: The wrapper stages objects and bitcode beside the real outputs under predictable names
// PURITY: CORE (node:path is used only for string manipulation)
// INVARIANT: No filesystem access; paths are opaque strings
// COMPLEXITY: O(|path|)

import * as path from "node:path";

import { Either } from "effect";

import { DEFAULT_BINARY_NAME } from "./classifier/defaults.js";
import { NoInputFiles } from "./errors.js";
import type { ClassificationResult } from "./models.js";

const rootOf = (file: string): string => {
	const base = path.basename(file);
	return base.slice(0, base.length - path.extname(base).length);
};

/**
 * Name of the file the real compiler invocation writes.
 *
 * @returns explicit `-o` value; `<root>.o` of the first input under `-c`; otherwise the default binary name
 *
 * @pure true
 * @precondition isCompileOnly without -o requires at least one input file
 */
export function getOutputFilename(
	result: ClassificationResult,
	defaultBinaryName: string = DEFAULT_BINARY_NAME,
): Either.Either<string, NoInputFiles> {
	if (result.outputFilename !== undefined) {
		return Either.right(result.outputFilename);
	}
	if (!result.isCompileOnly) {
		return Either.right(defaultBinaryName);
	}
	const [first] = result.inputFiles;
	return first === undefined
		? Either.left(
				new NoInputFiles({
					detail: "compile-only invocation without -o names no input file",
				}),
			)
		: Either.right(`${rootOf(first)}.o`);
}

/**
 * Hidden bitcode file paired with an output: `dir/name` → `dir/.name.bc`.
 * The directory part is kept as written (`./out` → `./.out.bc`).
 *
 * @pure true
 */
export const getBitcodeFileName = (outputFilename: string): string => {
	const cut = outputFilename.lastIndexOf(path.sep) + 1;
	return `${outputFilename.slice(0, cut)}.${outputFilename.slice(cut)}.bc`;
};

/**
 * Object and bitcode names for one source file.
 *
 * @example
 * ```ts
 * getArtifactNames("dir/x.cpp", true); // [".x.o", ".x.o.bc"]
 * ```
 *
 * @pure true
 */
export function getArtifactNames(
	srcFile: string,
	hidden = false,
): readonly [objectName: string, bitcodeName: string] {
	const root = rootOf(srcFile);
	const objectName = hidden ? `.${root}.o` : `${root}.o`;
	return [objectName, `.${root}.o.bc`];
}
