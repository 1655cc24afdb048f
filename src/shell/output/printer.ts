// CHANGE: Print a classification report on stdout
// WHY: Output is the only stdout effect of the tool
// PURITY: SHELL
// EFFECT: Effect<void>

import { Console, Effect } from "effect";

import { formatDump } from "../../core/format/dump.js";
import { buildReport } from "../../core/format/report.js";
import type { ClassificationResult } from "../../core/models.js";
import type { OutputFormat } from "../../core/types/index.js";

/**
 * Lines printed for a result in the given format.
 *
 * @pure true
 */
export function renderResult(
	result: ClassificationResult,
	format: OutputFormat,
	defaultBinaryName?: string,
): string {
	if (format === "json") {
		return JSON.stringify(buildReport(result, defaultBinaryName), null, 2);
	}
	const { bitcode } = buildReport(result, defaultBinaryName);
	return [
		...formatDump(result, defaultBinaryName),
		bitcode.skip ? `bitcode: skip (${bitcode.reason})` : "bitcode: emit",
	].join("\n");
}

export const printResult = (
	result: ClassificationResult,
	format: OutputFormat,
	defaultBinaryName?: string,
): Effect.Effect<void> =>
	Console.log(renderResult(result, format, defaultBinaryName));
