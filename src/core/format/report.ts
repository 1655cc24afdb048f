// CHANGE: Serializable report of a classification and its derived names
// WHY: The JSON output and library consumers read one stable shape
// PURITY: CORE
// INVARIANT: artifacts.length = inputFiles.length, in the same order

import { Either } from "effect";

import {
	getArtifactNames,
	getBitcodeFileName,
	getOutputFilename,
} from "../artifacts.js";
import { skipBitcodeGeneration } from "../decision.js";
import type {
	BitcodeDecision,
	ClassificationFlags,
	ClassificationResult,
} from "../models.js";

export interface ArtifactPair {
	readonly source: string;
	readonly objectName: string;
	readonly bitcodeName: string;
}

export interface ClassificationReport {
	readonly inputFiles: readonly string[];
	readonly objectFiles: readonly string[];
	readonly compileArgs: readonly string[];
	readonly linkArgs: readonly string[];
	readonly forbiddenArgs: readonly string[];
	readonly outputFilename: string | null;
	readonly bitcodeFilename: string | null;
	readonly artifacts: readonly ArtifactPair[];
	readonly flags: ClassificationFlags;
	readonly bitcode: BitcodeDecision;
}

/**
 * @pure true
 * @complexity O(|inputFiles|)
 */
export function buildReport(
	result: ClassificationResult,
	defaultBinaryName?: string,
): ClassificationReport {
	const output = Either.getOrNull(getOutputFilename(result, defaultBinaryName));
	return {
		inputFiles: result.inputFiles,
		objectFiles: result.objectFiles,
		compileArgs: result.compileArgs,
		linkArgs: result.linkArgs,
		forbiddenArgs: result.forbiddenArgs,
		outputFilename: output,
		bitcodeFilename: output === null ? null : getBitcodeFileName(output),
		artifacts: result.inputFiles.map((source) => {
			const [objectName, bitcodeName] = getArtifactNames(source);
			return { source, objectName, bitcodeName };
		}),
		flags: {
			isVerbose: result.isVerbose,
			isDependencyOnly: result.isDependencyOnly,
			isPreprocessOnly: result.isPreprocessOnly,
			isAssembleOnly: result.isAssembleOnly,
			isAssembly: result.isAssembly,
			isCompileOnly: result.isCompileOnly,
			isEmitLLVM: result.isEmitLLVM,
			isStandardIn: result.isStandardIn,
		},
		bitcode: skipBitcodeGeneration(result),
	};
}
