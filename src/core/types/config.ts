// CHANGE: Configuration and CLI option types for the classifier tool
// WHY: Keep shell-facing option shapes beside the other CORE types

/**
 * How the CLI renders a classification.
 */
export type OutputFormat = "json" | "text";

/**
 * Minimum log level accepted on the command line.
 */
export type LogLevelName = "debug" | "info" | "warning" | "error";

/**
 * Options of the `cc-classify` command.
 *
 * @property configPath Path of the JSON rule configuration
 * @property format Output rendering
 * @property dump Force the partitioning dump on stderr
 * @property logLevel Minimum level replayed through the logger
 * @property compilerArgs Compiler argv tail to classify
 */
export interface CLIOptions {
	readonly configPath: string;
	readonly format: OutputFormat;
	readonly dump: boolean;
	readonly logLevel: LogLevelName;
	readonly compilerArgs: readonly string[];
}
