/**
 * Endpoint Configuration
 *
 * Schema-validated settings for both endpoint roles. Every field is optional
 * on input and filled from the defaults on decode.
 */

import { Config, Effect, ParseResult, Schema, pipe } from 'effect';
import { TransportError, type ServeTarget } from './shared';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_OPEN_TIMEOUT_MS = 10_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 1_000;

const Millis = pipe(Schema.Number, Schema.int(), Schema.nonNegative());

// =============================================================================
// Schemas
// =============================================================================

export const AcceptorConfigSchema = Schema.Struct({
  name: Schema.optionalWith(Schema.NonEmptyString, { default: () => 'acceptor' }),
  host: Schema.optionalWith(Schema.NonEmptyString, { default: () => DEFAULT_HOST }),
  shutdownTimeoutMs: Schema.optionalWith(Millis, {
    default: () => DEFAULT_SHUTDOWN_TIMEOUT_MS,
  }),
});

export const ConnectorConfigSchema = Schema.Struct({
  name: Schema.optionalWith(Schema.NonEmptyString, { default: () => 'connector' }),
  openTimeoutMs: Schema.optionalWith(Millis, { default: () => DEFAULT_OPEN_TIMEOUT_MS }),
  shutdownTimeoutMs: Schema.optionalWith(Millis, {
    default: () => DEFAULT_SHUTDOWN_TIMEOUT_MS,
  }),
});

export type AcceptorConfig = typeof AcceptorConfigSchema.Type;
export type AcceptorConfigInput = typeof AcceptorConfigSchema.Encoded;
export type ConnectorConfig = typeof ConnectorConfigSchema.Type;
export type ConnectorConfigInput = typeof ConnectorConfigSchema.Encoded;

// =============================================================================
// Decoding
// =============================================================================

const toConfigError = (error: ParseResult.ParseError): TransportError =>
  new TransportError({
    message: `Invalid endpoint configuration: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
    cause: error,
  });

export const decodeAcceptorConfig = (
  input: AcceptorConfigInput = {}
): Effect.Effect<AcceptorConfig, TransportError> =>
  pipe(input, Schema.decodeUnknown(AcceptorConfigSchema), Effect.mapError(toConfigError));

export const decodeConnectorConfig = (
  input: ConnectorConfigInput = {}
): Effect.Effect<ConnectorConfig, TransportError> =>
  pipe(input, Schema.decodeUnknown(ConnectorConfigSchema), Effect.mapError(toConfigError));

// =============================================================================
// Environment
// =============================================================================

/**
 * Serve target from `PLOTBRIDGE_HOST` and `PLOTBRIDGE_PORT`, defaulting to
 * the loopback address and an ephemeral port.
 */
export const serveTargetFromEnv: Config.Config<ServeTarget> = Config.all({
  host: Config.withDefault(Config.string('PLOTBRIDGE_HOST'), DEFAULT_HOST),
  port: Config.withDefault(Config.integer('PLOTBRIDGE_PORT'), 0),
});
