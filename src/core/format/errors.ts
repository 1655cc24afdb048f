// PURITY: CORE
// INVARIANT: every AppError variant has exactly one rendering

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

/**
 * One-line description of a fatal error.
 *
 * @pure true
 */
export const formatError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "MalformedArity" },
			(e) =>
				`Flag "${e.flag}" expects ${e.expected} argument(s) but only ${e.available} remain`,
		)
		.with(
			{ _tag: "OverlappingPatterns" },
			(e) => `Token "${e.token}" matches several patterns: ${e.patterns.join(", ")}`,
		)
		.with(
			{ _tag: "OutOfContextFlag" },
			(e) => `Flag "${e.flag}" cannot appear in ${JSON.stringify(e.inputList)}`,
		)
		.with({ _tag: "InvalidRule" }, (e) => `Invalid rule ${e.key}: ${e.detail}`)
		.with({ _tag: "NoInputFiles" }, (e) => e.detail)
		.with({ _tag: "ConfigError" }, (e) =>
			e.path === undefined ? `Configuration: ${e.detail}` : `Configuration ${e.path}: ${e.detail}`,
		)
		.exhaustive();
