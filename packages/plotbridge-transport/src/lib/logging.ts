/**
 * Log level control for endpoints. Every endpoint logs through Effect's
 * logger, annotated with its name; these layers pick how much of it is shown.
 */

import { Config, ConfigError, Effect, Layer, LogLevel, Logger, pipe } from 'effect';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'none';

const logLevels: Readonly<Record<LogLevelName, LogLevel.LogLevel>> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

export const toLogLevel = (name: LogLevelName): LogLevel.LogLevel => logLevels[name];

export const logLevelLayer = (name: LogLevelName): Layer.Layer<never> =>
  Logger.minimumLogLevel(toLogLevel(name));

export const LogLevelConfig: Config.Config<LogLevelName> = pipe(
  Config.literal('trace', 'debug', 'info', 'warn', 'error', 'none')('PLOTBRIDGE_LOG_LEVEL'),
  Config.withDefault('info')
);

/**
 * Minimum log level read from `PLOTBRIDGE_LOG_LEVEL`, `info` when unset.
 */
export const logLevelFromEnv: Layer.Layer<never, ConfigError.ConfigError> = Layer.unwrapEffect(
  Effect.map(LogLevelConfig, logLevelLayer)
);

export const silentLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.make(() => {})
);
