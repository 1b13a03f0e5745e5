import { describe, it, expect } from '@effect/vitest';
import { ConfigProvider, Effect, FiberRef, LogLevel, pipe } from 'effect';
import { decodeAcceptorConfig, decodeConnectorConfig, serveTargetFromEnv } from './config';
import { LogLevelConfig, logLevelFromEnv, logLevelLayer, toLogLevel } from './logging';

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe('endpoint configuration', () => {
  it.effect('fills acceptor defaults', () =>
    pipe(
      decodeAcceptorConfig(),
      Effect.map((config) =>
        expect(config).toEqual({ name: 'acceptor', host: '127.0.0.1', shutdownTimeoutMs: 1000 })
      )
    )
  );

  it.effect('keeps supplied connector settings', () =>
    pipe(
      decodeConnectorConfig({ name: 'plot-client', openTimeoutMs: 250 }),
      Effect.map((config) =>
        expect(config).toEqual({ name: 'plot-client', openTimeoutMs: 250, shutdownTimeoutMs: 1000 })
      )
    )
  );

  it.effect('rejects a negative timeout', () =>
    pipe(
      decodeConnectorConfig({ openTimeoutMs: -1 }),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('TransportError');
        expect(error.message.startsWith('Invalid endpoint configuration')).toBe(true);
      })
    )
  );

  it.effect('reads the serve target from the environment', () =>
    pipe(
      serveTargetFromEnv,
      withEnv([
        ['PLOTBRIDGE_HOST', '0.0.0.0'],
        ['PLOTBRIDGE_PORT', '9001'],
      ]),
      Effect.map((target) => expect(target).toEqual({ host: '0.0.0.0', port: 9001 }))
    )
  );

  it.effect('defaults the serve target to an ephemeral loopback port', () =>
    pipe(
      serveTargetFromEnv,
      withEnv([]),
      Effect.map((target) => expect(target).toEqual({ host: '127.0.0.1', port: 0 }))
    )
  );
});

describe('log levels', () => {
  it.effect('reads the level name from the environment', () =>
    pipe(
      LogLevelConfig,
      withEnv([['PLOTBRIDGE_LOG_LEVEL', 'debug']]),
      Effect.map((level) => expect(level).toBe('debug'))
    )
  );

  it.effect('defaults to info', () =>
    pipe(
      LogLevelConfig,
      withEnv([]),
      Effect.map((level) => expect(level).toBe('info'))
    )
  );

  it.effect('sets the minimum log level', () =>
    pipe(
      FiberRef.get(FiberRef.currentMinimumLogLevel),
      Effect.provide(logLevelLayer('error')),
      Effect.map((level) => expect(level).toEqual(LogLevel.Error))
    )
  );

  it.effect('applies the level named in the environment', () =>
    pipe(
      FiberRef.get(FiberRef.currentMinimumLogLevel),
      Effect.provide(logLevelFromEnv),
      withEnv([['PLOTBRIDGE_LOG_LEVEL', 'warn']]),
      Effect.map((level) => expect(level).toEqual(LogLevel.Warning))
    )
  );

  it.effect('rejects an unknown level name', () =>
    pipe(
      FiberRef.get(FiberRef.currentMinimumLogLevel),
      Effect.provide(logLevelFromEnv),
      withEnv([['PLOTBRIDGE_LOG_LEVEL', 'loud']]),
      Effect.flip,
      Effect.map((error) => expect(error._tag).toBe('InvalidData'))
    )
  );

  it('maps level names to log levels', () => {
    expect(toLogLevel('trace')).toEqual(LogLevel.Trace);
    expect(toLogLevel('warn')).toEqual(LogLevel.Warning);
    expect(toLogLevel('none')).toEqual(LogLevel.None);
  });
});
