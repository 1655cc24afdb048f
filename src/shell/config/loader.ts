// CHANGE: Load caller rule overrides from classifier.config.json
// WHY: Build wrappers tune the rule tables per project without code changes
// PURITY: SHELL (reads filesystem)
// EFFECT: Effect<ClassifierOptions, ConfigError>
// INVARIANT: A missing optional file yields {}; malformed content is a ConfigError, never a partial config
// COMPLEXITY: O(n) where n = |exactMatches| + |patternMatches|

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import {
	BUILTIN_ACTIONS,
	type BuiltinActionTag,
	type ClassifierOptions,
	type PatternRule,
	type Rule,
} from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "classifier.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| readonly JSONValue[]
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

function isArray(value: JSONValue): value is readonly JSONValue[] {
	return Array.isArray(value);
}

function isActionName(value: JSONValue | undefined): value is BuiltinActionTag {
	return (
		typeof value === "string" &&
		BUILTIN_ACTIONS.some((name) => name === value)
	);
}

/**
 * Validate `{ "arity"?: number, "action": string }`.
 *
 * @invariant arity defaults to 0; range checks happen when the tables are built
 */
function parseRule(
	where: string,
	value: JSONValue,
): Either.Either<Rule, ConfigError> {
	if (!isJSONObject(value)) {
		return Either.left(new ConfigError({ detail: `${where}: expected an object` }));
	}
	const { arity = 0, action } = value;
	if (typeof arity !== "number") {
		return Either.left(new ConfigError({ detail: `${where}: arity must be a number` }));
	}
	if (!isActionName(action)) {
		return Either.left(
			new ConfigError({
				detail: `${where}: action must be one of ${BUILTIN_ACTIONS.join(", ")}`,
			}),
		);
	}
	return Either.right({ arity, action: { _tag: action } });
}

function compileRegExp(
	where: string,
	source: JSONValue | undefined,
	flags: JSONValue | undefined,
): Either.Either<RegExp, ConfigError> {
	if (typeof source !== "string") {
		return Either.left(new ConfigError({ detail: `${where}: pattern must be a string` }));
	}
	if (flags !== undefined && typeof flags !== "string") {
		return Either.left(new ConfigError({ detail: `${where}: flags must be a string` }));
	}
	return Either.try({
		try: () => new RegExp(source, flags),
		catch: (error) =>
			new ConfigError({ detail: `${where}: ${String(error)}` }),
	});
}

function parsePatternRule(
	where: string,
	value: JSONValue,
): Either.Either<PatternRule, ConfigError> {
	if (!isJSONObject(value)) {
		return Either.left(new ConfigError({ detail: `${where}: expected an object` }));
	}
	return Either.zipWith(
		compileRegExp(where, value["pattern"], value["flags"]),
		parseRule(where, value),
		(pattern, parsed): PatternRule => ({ pattern, ...parsed }),
	);
}

function parseExactMatches(
	value: JSONValue | undefined,
): Either.Either<Readonly<Record<string, Rule>>, ConfigError> {
	if (value === undefined) return Either.right({});
	if (!isJSONObject(value)) {
		return Either.left(new ConfigError({ detail: "exactMatches must be an object" }));
	}
	return Either.map(
		Either.all(
			Object.entries(value).map(([key, entry]) =>
				Either.map(
					parseRule(`exactMatches["${key}"]`, entry),
					(parsed): [string, Rule] => [key, parsed],
				),
			),
		),
		(entries) => Object.fromEntries(entries),
	);
}

function parsePatternMatches(
	value: JSONValue | undefined,
): Either.Either<readonly PatternRule[], ConfigError> {
	if (value === undefined) return Either.right([]);
	if (!isArray(value)) {
		return Either.left(new ConfigError({ detail: "patternMatches must be an array" }));
	}
	return Either.all(
		value.map((entry, index) =>
			parsePatternRule(`patternMatches[${index}]`, entry),
		),
	);
}

/**
 * Turn parsed JSON into classifier options.
 *
 * @pure true
 * @postcondition Right(options) ⇒ every rule names a built-in action
 */
export function parseClassifierConfig(
	value: JSONValue,
): Either.Either<ClassifierOptions, ConfigError> {
	if (!isJSONObject(value)) {
		return Either.left(new ConfigError({ detail: "configuration must be a JSON object" }));
	}
	const { dump = false, defaultBinaryName } = value;
	if (typeof dump !== "boolean") {
		return Either.left(new ConfigError({ detail: "dump must be a boolean" }));
	}
	if (defaultBinaryName !== undefined && typeof defaultBinaryName !== "string") {
		return Either.left(new ConfigError({ detail: "defaultBinaryName must be a string" }));
	}
	return Either.zipWith(
		parseExactMatches(value["exactMatches"]),
		parsePatternMatches(value["patternMatches"]),
		(exactMatches, patternMatches): ClassifierOptions => ({
			exactMatches,
			patternMatches,
			dump,
			...(defaultBinaryName === undefined ? {} : { defaultBinaryName }),
		}),
	);
}

/**
 * Load classifier options from a JSON file.
 *
 * @param configPath File to read
 * @param required Fail instead of returning defaults when the file is absent
 *
 * @pure false (reads filesystem)
 * @effect Effect<ClassifierOptions, ConfigError>
 */
export function loadClassifierConfig(
	configPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE),
	required = false,
): Effect.Effect<ClassifierOptions, ConfigError> {
	return Effect.gen(function* () {
		if (!required && !fs.existsSync(configPath)) {
			return {};
		}
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigError({ detail: String(error), path: configPath }),
		});
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({ detail: String(error), path: configPath }),
		});
		return yield* Either.mapLeft(
			parseClassifierConfig(parsed),
			(error) => new ConfigError({ detail: error.detail, path: configPath }),
		);
	});
}
