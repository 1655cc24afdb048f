// CHANGE: Default rule tables for GCC/Clang-style invocations
// WHY: Optimization levels are owned by the wrapper, so every -O form is stripped
// PURITY: CORE
// INVARIANT: no token fully matches two default patterns

import type { BuiltinActionTag, PatternRule, Rule } from "../types/rules.js";

export const rule = (tag: BuiltinActionTag, arity = 0): Rule => ({
	arity,
	action: { _tag: tag },
});

export const patternRule = (
	pattern: RegExp,
	tag: BuiltinActionTag,
	arity = 0,
): PatternRule => ({ pattern, ...rule(tag, arity) });

const OPTIMIZATION_LEVELS = [
	"-O",
	"-O0",
	"-O1",
	"-O2",
	"-O3",
	"-Os",
	"-Ofast",
	"-Og",
] as const;

export const DEFAULT_EXACT_MATCHES: ReadonlyMap<string, Rule> = new Map<
	string,
	Rule
>([
	["-", rule("StandardIn")],
	["-o", rule("OutputFile", 1)],
	["-c", rule("CompileOnly")],
	["-E", rule("PreprocessOnly")],
	["-S", rule("AssembleOnly")],
	["--verbose", rule("Verbose")],
	// No inputs are expected alongside these.
	["--version", rule("CompileOnly")],
	["-v", rule("CompileOnly")],
	...OPTIMIZATION_LEVELS.map((flag): [string, Rule] => [
		flag,
		rule("Forbidden"),
	]),
]);

/**
 * Ordered default patterns.
 */
export const DEFAULT_PATTERN_MATCHES: readonly PatternRule[] = [
	patternRule(/^.+\.(c|cc|cpp|C|cxx|i|s|S|bc)$/, "InputFile"),
	// Fortran
	patternRule(/^.+\.([fF](|[0-9][0-9]|or|OR|pp|PP))$/, "InputFile"),
	patternRule(/^.+\.(o|lo|So|so|po|a|dylib)$/, "ObjectFile"),
	// Versioned shared libraries: libfoo.so.4.5.6, libicu.so.72, libfoo.dylib.1
	patternRule(/^.+\.dylib(\.\d+)+$/, "ObjectFile"),
	patternRule(/^.+\.(So|so)(\.\d+)+$/, "ObjectFile"),
	patternRule(/^-O[0-9]+$/, "Forbidden"),
];

export const GROUP_START = "-Wl,--start-group";
export const GROUP_END = "-Wl,--end-group";

export const DEFAULT_BINARY_NAME = "a.out";
