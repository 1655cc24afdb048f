// CHANGE: Parse the classifier tool's own command line
// WHY: Tool switches come first; everything after them is the compiler invocation to classify
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: compilerArgs is a suffix of argv; tool options are never classified
// COMPLEXITY: O(n) where n = |argv|

import * as path from "node:path";

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type {
	CLIOptions,
	LogLevelName,
	OutputFormat,
} from "../../core/types/index.js";
import { DEFAULT_CONFIG_FILE } from "./loader.js";

/**
 * Parsed options plus whether --config was given explicitly.
 */
export interface ParsedCLI {
	readonly options: CLIOptions;
	readonly explicitConfig: boolean;
}

type ValueFlagHandler = (
	value: string,
	current: ParsedCLI,
	cwd: string,
) => Either.Either<ParsedCLI, ConfigError>;

const FORMATS: readonly OutputFormat[] = ["json", "text"];
const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warning", "error"];

const withOptions = (
	current: ParsedCLI,
	patch: Partial<CLIOptions>,
): ParsedCLI => ({ ...current, options: { ...current.options, ...patch } });

function oneOf<T extends string>(
	flag: string,
	allowed: readonly T[],
	value: string,
): Either.Either<T, ConfigError> {
	const found = allowed.find((a) => a === value);
	return found === undefined
		? Either.left(
				new ConfigError({
					detail: `${flag} expects one of ${allowed.join(", ")}, got "${value}"`,
				}),
			)
		: Either.right(found);
}

const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	[
		"--config",
		(value, current, cwd) =>
		Either.right({
			...withOptions(current, { configPath: path.resolve(cwd, value) }),
			explicitConfig: true,
		}),
	],
	[
		"--format",
		(value, current) =>
			Either.map(oneOf("--format", FORMATS, value), (format) =>
				withOptions(current, { format }),
			),
	],
	[
		"--log-level",
		(value, current) =>
			Either.map(oneOf("--log-level", LOG_LEVELS, value), (logLevel) =>
				withOptions(current, { logLevel }),
			),
	],
]);

/**
 * Parse tool options, then hand the remainder over as compiler arguments.
 *
 * @example
 * ```ts
 * // Command: cc-classify --format text -- -c foo.c
 * parseCLIArgs(["--format", "text", "--", "-c", "foo.c"]);
 * // Right({ options: { format: "text", compilerArgs: ["-c", "foo.c"], ... }, explicitConfig: false })
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
): Either.Either<ParsedCLI, ConfigError> {
	let state: ParsedCLI = {
		options: {
			configPath: path.resolve(cwd, DEFAULT_CONFIG_FILE),
			format: "json",
			dump: false,
			logLevel: "warning",
			compilerArgs: [],
		},
		explicitConfig: false,
	};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "--") {
			return Either.right(withOptions(state, { compilerArgs: argv.slice(i + 1) }));
		}
		if (arg === "--dump") {
			state = withOptions(state, { dump: true });
			continue;
		}
		const handler = valueHandlers.get(arg);
		if (handler === undefined) {
			return Either.right(withOptions(state, { compilerArgs: argv.slice(i) }));
		}
		const value = argv[i + 1];
		if (value === undefined) {
			return Either.left(new ConfigError({ detail: `${arg} expects a value` }));
		}
		const next = handler(value, state, cwd);
		if (Either.isLeft(next)) return next;
		state = next.right;
		i++;
	}

	return Either.right(state);
}
