// CHANGE: Central export file for classifier type definitions
// WHY: Provides a single import point for all types used across modules

export type { CLIOptions, OutputFormat, LogLevelName } from "./config.js";
export type {
	BuiltinActionTag,
	ClassifierOptions,
	CompiledPatternRule,
	PatternRule,
	Rule,
	RuleAction,
	RuleHandler,
	RuleTables,
} from "./rules.js";
export { BUILTIN_ACTIONS } from "./rules.js";
