import { Data } from 'effect';

/**
 * The peer answered a call with a JSON-RPC error object.
 */
export class RpcResponseError extends Data.TaggedError('RpcResponseError')<{
  readonly code: number;
  readonly message: string;
  readonly data: unknown;
}> {}

/**
 * A request could not be encoded or handed to the endpoint.
 */
export class RpcSendError extends Data.TaggedError('RpcSendError')<{
  readonly method: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Raised by a method handler to answer with a specific error code, message
 * and data instead of a generic internal error.
 */
export class RpcHandlerError extends Data.TaggedError('RpcHandlerError')<{
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}> {}

export type RpcCallError = RpcResponseError | RpcSendError;
