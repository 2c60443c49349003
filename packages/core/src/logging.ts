import { Config, Effect, Logger, LogLevel } from "effect";

/**
 * Environment variable holding the minimum log level of every actor,
 * e.g. `STATETREE_LOG_LEVEL=DEBUG`.
 */
export const LOG_LEVEL_ENV = "STATETREE_LOG_LEVEL";

export const logLevelConfig: Config.Config<LogLevel.LogLevel> = Config.logLevel(LOG_LEVEL_ENV).pipe(
  Config.withDefault(LogLevel.Info)
);

/**
 * The explicit level if given, otherwise the configured one. An unparsable
 * value falls back to Info with a warning.
 */
export const resolveLogLevel = (override?: LogLevel.LogLevel): Effect.Effect<LogLevel.LogLevel> =>
  override !== undefined
    ? Effect.succeed(override)
    : Effect.gen(function* () {
        return yield* logLevelConfig;
      }).pipe(
        Effect.catchAll((error) =>
          Effect.as(Effect.logWarning(`Ignoring ${LOG_LEVEL_ENV}: ${String(error)}`), LogLevel.Info)
        )
      );

/**
 * Annotate every log line with the machine id and apply the minimum level.
 * Fibers forked inside `self` inherit both.
 */
export const withMachineLogging =
  (machineId: string, level: LogLevel.LogLevel) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    self.pipe(Effect.annotateLogs("machine", machineId), Logger.withMinimumLogLevel(level));
