// CHANGE: Route Effect log output to stderr and map CLI levels to LogLevel
// WHY: stdout carries the classification report; diagnostics must not interleave with it
// PURITY: SHELL
// EFFECT: Layer<never> replacing the default logger

import { Effect, Logger, LogLevel } from "effect";
import { match } from "ts-pattern";

import type { LogLevelName } from "../../core/types/index.js";

export const stderrLogger = Logger.replace(
	Logger.defaultLogger,
	Logger.withConsoleError(Logger.logfmtLogger),
);

export const toLogLevel = (name: LogLevelName): LogLevel.LogLevel =>
	match(name)
		.with("debug", () => LogLevel.Debug)
		.with("info", () => LogLevel.Info)
		.with("warning", () => LogLevel.Warning)
		.with("error", () => LogLevel.Error)
		.exhaustive();

/**
 * Run an effect with stderr logging at the given minimum level.
 */
export const withLogging =
	(level: LogLevelName) =>
	<A, E>(self: Effect.Effect<A, E>): Effect.Effect<A, E> =>
		self.pipe(
			Logger.withMinimumLogLevel(toLogLevel(level)),
			Effect.provide(stderrLogger),
		);
