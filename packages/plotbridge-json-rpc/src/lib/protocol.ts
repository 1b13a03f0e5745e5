/**
 * JSON-RPC 2.0 wire format: message schemas, error codes, encoders and the
 * classification of inbound text frames.
 */

import { Data, Effect, Either, Option, Predicate, Schema, pipe } from 'effect';
import { describeError } from '@plotbridge/transport';

export const JSONRPC_VERSION = '2.0';

export const ErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SERVER_ERROR: -32000,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// Wire Schemas
// ============================================================================

export const RequestId = Schema.Union(Schema.String, Schema.Number, Schema.Null);
export type RequestId = typeof RequestId.Type;

export const ErrorObject = Schema.Struct({
  code: Schema.Number,
  message: Schema.String,
  data: Schema.optional(Schema.Unknown),
});
export type ErrorObject = typeof ErrorObject.Type;

export const RequestMessage = Schema.Struct({
  jsonrpc: Schema.Literal(JSONRPC_VERSION),
  method: Schema.String,
  params: Schema.optional(Schema.Unknown),
  id: Schema.optional(RequestId),
});
export type RequestMessage = typeof RequestMessage.Type;

export const SuccessResponse = Schema.Struct({
  jsonrpc: Schema.Literal(JSONRPC_VERSION),
  id: RequestId,
  result: Schema.Unknown,
});
export type SuccessResponse = typeof SuccessResponse.Type;

export const ErrorResponse = Schema.Struct({
  jsonrpc: Schema.Literal(JSONRPC_VERSION),
  id: RequestId,
  error: ErrorObject,
});
export type ErrorResponse = typeof ErrorResponse.Type;

// ============================================================================
// Encoders
// ============================================================================

const stringify = (value: unknown): Effect.Effect<string, Error> =>
  pipe(
    Effect.try({
      try: (): string | undefined => JSON.stringify(value),
      catch: (error) => new Error(`Cannot encode message: ${describeError(error)}`),
    }),
    Effect.flatMap((encoded) =>
      encoded === undefined
        ? Effect.fail(new Error('Cannot encode message: value has no JSON representation'))
        : Effect.succeed(encoded)
    )
  );

const orNull = (value: unknown): unknown => (value === undefined ? null : value);

// A payload JSON.stringify would drop (a function, a symbol, a `toJSON`
// returning undefined) must fail rather than vanish from the frame.
const payload = (value: unknown): Effect.Effect<unknown, Error> =>
  pipe(stringify(orNull(value)), Effect.as(orNull(value)));

export const encodeRequest = (
  id: number,
  method: string,
  params: unknown
): Effect.Effect<string, Error> =>
  pipe(
    payload(params),
    Effect.flatMap((encodable) =>
      stringify({ jsonrpc: JSONRPC_VERSION, method, params: encodable, id })
    )
  );

export const encodeNotification = (method: string, params: unknown): Effect.Effect<string, Error> =>
  pipe(
    payload(params),
    Effect.flatMap((encodable) => stringify({ jsonrpc: JSONRPC_VERSION, method, params: encodable }))
  );

export const encodeSuccess = (id: RequestId, result: unknown): Effect.Effect<string, Error> =>
  pipe(
    payload(result),
    Effect.flatMap((encodable) => stringify({ jsonrpc: JSONRPC_VERSION, id, result: encodable }))
  );

const errorReply = (id: RequestId, error: ErrorObject, data: unknown) =>
  pipe(
    payload(data),
    Effect.flatMap((encodable) =>
      stringify({
        jsonrpc: JSONRPC_VERSION,
        id,
        error: { code: error.code, message: error.message, data: encodable },
      })
    )
  );

/**
 * Error replies always carry `data`, `null` when there is none. When `data`
 * cannot be encoded the reply carries `null` instead.
 */
export const encodeError = (id: RequestId, error: ErrorObject): Effect.Effect<string> =>
  pipe(
    errorReply(id, error, error.data),
    Effect.orElse(() => errorReply(id, error, null)),
    Effect.orDie
  );

// ============================================================================
// Inbound Classification
// ============================================================================

export type Inbound = Data.TaggedEnum<{
  /** Not JSON at all */
  Malformed: { readonly detail: string };
  /** A reply to one of our calls */
  Response: {
    readonly id: RequestId;
    readonly outcome: Either.Either<unknown, ErrorObject>;
  };
  /** Not a valid request; answered only when it carried an id */
  Invalid: { readonly id: Option.Option<RequestId> };
  Notification: { readonly method: string; readonly params: unknown };
  Request: { readonly id: RequestId; readonly method: string; readonly params: unknown };
}>;

export const Inbound = Data.taggedEnum<Inbound>();

const isRequestId = Schema.is(RequestId);

const looksLikeResponse = (value: Record<PropertyKey, unknown>): boolean =>
  value['jsonrpc'] === JSONRPC_VERSION &&
  Predicate.hasProperty(value, 'id') &&
  !Predicate.hasProperty(value, 'method') &&
  (Predicate.hasProperty(value, 'result') || Predicate.hasProperty(value, 'error'));

const decodeResponse = (value: Record<PropertyKey, unknown>): Inbound =>
  Predicate.hasProperty(value, 'error')
    ? Either.match(Schema.decodeUnknownEither(ErrorResponse)(value), {
        onLeft: () => Inbound.Invalid({ id: Option.none() }),
        onRight: (response) =>
          Inbound.Response({ id: response.id, outcome: Either.left(response.error) }),
      })
    : Either.match(Schema.decodeUnknownEither(SuccessResponse)(value), {
        onLeft: () => Inbound.Invalid({ id: Option.none() }),
        onRight: (response) =>
          Inbound.Response({ id: response.id, outcome: Either.right(response.result) }),
      });

const invalidRequest = (value: unknown): Inbound =>
  Predicate.isRecord(value) && Predicate.hasProperty(value, 'id')
    ? Inbound.Invalid({ id: Option.some(isRequestId(value.id) ? value.id : null) })
    : Inbound.Invalid({ id: Option.none() });

const toCall = (request: RequestMessage): Inbound => {
  const params = orNull(request.params);
  return request.id === undefined
    ? Inbound.Notification({ method: request.method, params })
    : Inbound.Request({ id: request.id, method: request.method, params });
};

const classifyValue = (value: unknown): Inbound => {
  if (Predicate.isRecord(value) && looksLikeResponse(value)) {
    return decodeResponse(value);
  }
  return Either.match(Schema.decodeUnknownEither(RequestMessage)(value), {
    onLeft: () => invalidRequest(value),
    onRight: toCall,
  });
};

/**
 * Sorts one inbound text frame into the kind of message it carries.
 */
export const classify = (text: string): Inbound =>
  Either.match(
    Either.try({
      try: (): unknown => JSON.parse(text),
      catch: describeError,
    }),
    {
      onLeft: (detail) => Inbound.Malformed({ detail }),
      onRight: classifyValue,
    }
  );
