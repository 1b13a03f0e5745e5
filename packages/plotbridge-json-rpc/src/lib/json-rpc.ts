/**
 * JSON-RPC Channel
 *
 * Request/response correlation, notifications and method dispatch on top of
 * any endpoint. One channel owns one callback on its endpoint; inbound frames
 * are handled on the endpoint's dispatch fiber, so handlers run one at a time
 * in arrival order. Outbound calls and notifications are sent on the caller's
 * fiber.
 *
 * A handler that awaits a call on the same channel blocks the dispatch fiber,
 * and with it the reply it is waiting for.
 */

import { randomUUID } from 'node:crypto';
import {
  Cause,
  Deferred,
  Duration,
  Effect,
  Either,
  HashMap,
  HashSet,
  Option,
  Ref,
  Schema,
  Scope,
  pipe,
} from 'effect';
import { describeError, type MessageCallback, type RpcTransport } from '@plotbridge/transport';
import { RpcHandlerError, RpcResponseError, RpcSendError, type RpcCallError } from './errors';
import {
  ErrorCode,
  Inbound,
  classify,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeSuccess,
  type ErrorObject,
  type RequestId,
} from './protocol';

// =============================================================================
// Types
// =============================================================================

export type MethodHandler = (params: unknown) => Effect.Effect<unknown, unknown>;
export type NotificationHandler = (params: unknown) => Effect.Effect<void, unknown>;

/**
 * An outstanding call. `result` resolves to the reply's result, or to `null`
 * once the call is cancelled or the channel closes.
 */
export interface PendingCall {
  readonly id: number;
  readonly result: Effect.Effect<unknown, RpcCallError>;
  readonly cancel: Effect.Effect<void>;
}

export interface JsonRpcOptions {
  /**
   * Stop the endpoint when the channel closes. Defaults to true.
   */
  readonly stopEndpointOnClose?: boolean;
}

export interface JsonRpc<T extends RpcTransport = RpcTransport> {
  readonly endpoint: T;

  // Inbound
  readonly registerHandler: (method: string, handler: MethodHandler) => Effect.Effect<void>;
  readonly registerNotification: (
    method: string,
    handler: NotificationHandler
  ) => Effect.Effect<void>;
  readonly unregisterHandler: (method: string) => Effect.Effect<void>;
  readonly unregisterNotification: (method: string) => Effect.Effect<void>;
  /**
   * Registers a notification handler under a freshly generated method name
   * and returns that name.
   */
  readonly registerEvent: (handler: NotificationHandler) => Effect.Effect<string>;

  // Outbound
  readonly call: (method: string, params?: unknown) => Effect.Effect<PendingCall>;
  /**
   * Waits for the reply for at most `timeout`; cancels the call and yields
   * `None` when it elapses.
   */
  readonly callWithTimeout: (
    method: string,
    params: unknown,
    timeout: Duration.DurationInput
  ) => Effect.Effect<Option.Option<unknown>, RpcCallError>;
  readonly notify: (method: string, params?: unknown) => Effect.Effect<boolean>;

  // Raw endpoint callbacks, released with the channel
  readonly registerEndpointCallback: (name: string, callback: MessageCallback) => Effect.Effect<void>;
  readonly unregisterEndpointCallback: (name: string) => Effect.Effect<void>;

  readonly close: Effect.Effect<void>;
}

type PendingTable = HashMap.HashMap<number, Deferred.Deferred<unknown, RpcCallError>>;

interface ChannelState {
  readonly endpoint: RpcTransport;
  readonly name: string;
  readonly stopEndpointOnClose: boolean;
  readonly nextId: Ref.Ref<number>;
  readonly pending: Ref.Ref<PendingTable>;
  readonly handlers: Ref.Ref<HashMap.HashMap<string, MethodHandler>>;
  readonly notifications: Ref.Ref<HashMap.HashMap<string, NotificationHandler>>;
  readonly tracked: Ref.Ref<HashSet.HashSet<string>>;
  readonly closed: Ref.Ref<boolean>;
}

// =============================================================================
// Replies
// =============================================================================

const reply = (state: ChannelState, frame: string): Effect.Effect<void> =>
  pipe(
    state.endpoint.send(frame),
    Effect.flatMap((sent) => (sent ? Effect.void : Effect.logWarning('Failed to send reply')))
  );

const replyError = (state: ChannelState, id: RequestId, error: ErrorObject): Effect.Effect<void> =>
  pipe(encodeError(id, error), Effect.flatMap((frame) => reply(state, frame)));

const toErrorObject = (cause: Cause.Cause<unknown>): ErrorObject => {
  const error = Cause.squash(cause);
  return error instanceof RpcHandlerError
    ? { code: error.code, message: error.message, data: error.data }
    : { code: ErrorCode.INTERNAL_ERROR, message: `Internal error: ${describeError(error)}` };
};

// =============================================================================
// Inbound Handling
// =============================================================================

const takePending = (id: number) => (table: PendingTable) =>
  [HashMap.get(table, id), HashMap.remove(table, id)] as const;

const settle = (
  deferred: Deferred.Deferred<unknown, RpcCallError>,
  outcome: Either.Either<unknown, ErrorObject>
): Effect.Effect<void> =>
  Either.match(outcome, {
    onLeft: (error) =>
      Deferred.fail(
        deferred,
        new RpcResponseError({
          code: error.code,
          message: error.message,
          data: error.data === undefined ? null : error.data,
        })
      ),
    onRight: (result) => Deferred.succeed(deferred, result),
  });

const handleResponse = (
  state: ChannelState,
  id: RequestId,
  outcome: Either.Either<unknown, ErrorObject>
): Effect.Effect<void> =>
  typeof id === 'number'
    ? pipe(
        Ref.modify(state.pending, takePending(id)),
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.logDebug('Dropping reply for unknown call', { id }),
            onSome: (deferred) => settle(deferred, outcome),
          })
        )
      )
    : Effect.logDebug('Dropping reply with foreign id', { id });

const runHandler = (handler: MethodHandler, params: unknown): Effect.Effect<unknown, unknown> =>
  Effect.suspend(() => handler(params));

const handleRequest = (
  state: ChannelState,
  id: RequestId,
  method: string,
  params: unknown
): Effect.Effect<void> =>
  pipe(
    Ref.get(state.handlers),
    Effect.map(HashMap.get(method)),
    Effect.flatMap(
      Option.match({
        onNone: () =>
          replyError(state, id, {
            code: ErrorCode.METHOD_NOT_FOUND,
            message: `Method not found: ${method}`,
          }),
        onSome: (handler) =>
          pipe(
            runHandler(handler, params),
            Effect.flatMap((result) => encodeSuccess(id, result)),
            Effect.matchCauseEffect({
              onFailure: (cause) =>
                pipe(
                  Effect.logDebug('Handler failed', cause),
                  Effect.zipRight(replyError(state, id, toErrorObject(cause)))
                ),
              onSuccess: (frame) => reply(state, frame),
            }),
            Effect.annotateLogs('method', method)
          ),
      })
    )
  );

const handleNotification = (
  state: ChannelState,
  method: string,
  params: unknown
): Effect.Effect<void> =>
  pipe(
    Ref.get(state.notifications),
    Effect.map(HashMap.get(method)),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.logDebug('No handler for notification'),
        onSome: (handler) =>
          pipe(
            Effect.suspend(() => handler(params)),
            Effect.catchAllCause((cause) => Effect.logError('Notification handler failed', cause))
          ),
      })
    ),
    Effect.annotateLogs('method', method)
  );

const dispatchInbound = (state: ChannelState, inbound: Inbound): Effect.Effect<void> =>
  Inbound.$match(inbound, {
    Malformed: ({ detail }) =>
      replyError(state, null, {
        code: ErrorCode.PARSE_ERROR,
        message: `Parse error: ${detail}`,
      }),
    Response: ({ id, outcome }) => handleResponse(state, id, outcome),
    Invalid: ({ id }) =>
      Option.match(id, {
        onNone: () => Effect.logDebug('Dropping invalid message without id'),
        onSome: (requestId) =>
          replyError(state, requestId, {
            code: ErrorCode.INVALID_REQUEST,
            message: 'Invalid JSON-RPC request format',
          }),
      }),
    Notification: ({ method, params }) => handleNotification(state, method, params),
    Request: ({ id, method, params }) => handleRequest(state, id, method, params),
  });

const handleInbound =
  (state: ChannelState): MessageCallback =>
  (text) =>
    Effect.annotateLogs(dispatchInbound(state, classify(text)), 'rpc', state.name);

// =============================================================================
// Outbound Calls
// =============================================================================

const nextId = (current: number): readonly [number, number] => [current, current + 1];

const sendRequest = (
  state: ChannelState,
  id: number,
  method: string,
  params: unknown
): Effect.Effect<void, RpcSendError> =>
  pipe(
    encodeRequest(id, method, params),
    Effect.mapError((error) => new RpcSendError({ method, message: error.message, cause: error })),
    Effect.flatMap(state.endpoint.send),
    Effect.filterOrFail(
      (sent) => sent,
      () => new RpcSendError({ method, message: 'Endpoint could not send the request' })
    ),
    Effect.asVoid
  );

const cancelCall = (
  state: ChannelState,
  id: number,
  deferred: Deferred.Deferred<unknown, RpcCallError>
): Effect.Effect<void> =>
  pipe(
    Ref.update(state.pending, HashMap.remove(id)),
    Effect.zipRight(Deferred.succeed(deferred, null)),
    Effect.asVoid
  );

const failCall = (
  state: ChannelState,
  id: number,
  deferred: Deferred.Deferred<unknown, RpcCallError>
) =>
  (error: RpcSendError): Effect.Effect<void> =>
    pipe(
      Ref.update(state.pending, HashMap.remove(id)),
      Effect.zipRight(Deferred.fail(deferred, error)),
      Effect.zipRight(Effect.logWarning('Call could not be sent', error.message)),
      Effect.annotateLogs({ rpc: state.name, method: error.method })
    );

const openCall = (state: ChannelState, method: string, params: unknown): Effect.Effect<PendingCall> =>
  pipe(
    Effect.all({
      id: Ref.modify(state.nextId, nextId),
      deferred: Deferred.make<unknown, RpcCallError>(),
    }),
    Effect.tap(({ id, deferred }) => Ref.update(state.pending, HashMap.set(id, deferred))),
    Effect.tap(({ id, deferred }) =>
      pipe(sendRequest(state, id, method, params), Effect.catchAll(failCall(state, id, deferred)))
    ),
    Effect.map(({ id, deferred }) => ({
      id,
      result: Deferred.await(deferred),
      cancel: cancelCall(state, id, deferred),
    }))
  );

const closedCall = (method: string): PendingCall => ({
  id: 0,
  result: Effect.fail(new RpcSendError({ method, message: 'JSON-RPC channel is closed' })),
  cancel: Effect.void,
});

const call =
  (state: ChannelState) =>
  (method: string, params?: unknown): Effect.Effect<PendingCall> =>
    pipe(
      Ref.get(state.closed),
      Effect.flatMap((closed) =>
        closed ? Effect.succeed(closedCall(method)) : openCall(state, method, params)
      )
    );

const cancelOnTimeout =
  (pending: PendingCall) =>
  (outcome: Option.Option<unknown>): Effect.Effect<void> =>
    Option.isNone(outcome) ? pending.cancel : Effect.void;

const callWithTimeout =
  (state: ChannelState) =>
  (
    method: string,
    params: unknown,
    timeout: Duration.DurationInput
  ): Effect.Effect<Option.Option<unknown>, RpcCallError> =>
    pipe(
      call(state)(method, params),
      Effect.flatMap((pending) =>
        pipe(pending.result, Effect.timeoutOption(timeout), Effect.tap(cancelOnTimeout(pending)))
      )
    );

const notify =
  (state: ChannelState) =>
  (method: string, params?: unknown): Effect.Effect<boolean> =>
    pipe(
      Ref.get(state.closed),
      Effect.flatMap((closed) =>
        closed
          ? pipe(Effect.logWarning('Notify on a closed channel'), Effect.as(false))
          : pipe(
              encodeNotification(method, params),
              Effect.flatMap(state.endpoint.send),
              Effect.catchAll((error) =>
                pipe(Effect.logWarning('Notification could not be encoded', error.message), Effect.as(false))
              )
            )
      ),
      Effect.annotateLogs({ rpc: state.name, method })
    );

// =============================================================================
// Registration
// =============================================================================

const registerEndpointCallback =
  (state: ChannelState) =>
  (name: string, callback: MessageCallback): Effect.Effect<void> =>
    pipe(
      state.endpoint.registerCallback(name, callback),
      Effect.zipRight(Ref.update(state.tracked, HashSet.add(name)))
    );

const unregisterEndpointCallback =
  (state: ChannelState) =>
  (name: string): Effect.Effect<void> =>
    pipe(
      state.endpoint.unregisterCallback(name),
      Effect.zipRight(Ref.update(state.tracked, HashSet.remove(name)))
    );

const registerEvent =
  (state: ChannelState) =>
  (handler: NotificationHandler): Effect.Effect<string> =>
    pipe(
      Effect.sync((): string => randomUUID()),
      Effect.tap((eventId) => Ref.update(state.notifications, HashMap.set(eventId, handler)))
    );

// =============================================================================
// Lifecycle
// =============================================================================

const releaseCallbacks = (state: ChannelState): Effect.Effect<void> =>
  pipe(
    Ref.getAndSet(state.tracked, HashSet.empty()),
    Effect.flatMap((names) =>
      Effect.forEach(names, state.endpoint.unregisterCallback, { discard: true })
    )
  );

const abandonPending = (state: ChannelState): Effect.Effect<void> =>
  pipe(
    Ref.getAndSet(state.pending, HashMap.empty()),
    Effect.flatMap((table) =>
      Effect.forEach(HashMap.values(table), (deferred) => Deferred.succeed(deferred, null), {
        discard: true,
      })
    )
  );

const close = (state: ChannelState): Effect.Effect<void> =>
  pipe(
    Ref.getAndSet(state.closed, true),
    Effect.flatMap((alreadyClosed) =>
      alreadyClosed
        ? Effect.void
        : pipe(
            releaseCallbacks(state),
            Effect.zipRight(abandonPending(state)),
            Effect.zipRight(state.stopEndpointOnClose ? state.endpoint.stop : Effect.void),
            Effect.zipRight(Effect.logDebug('JSON-RPC channel closed'))
          )
    ),
    Effect.annotateLogs('rpc', state.name)
  );

const makeChannel = <T extends RpcTransport>(endpoint: T, state: ChannelState): JsonRpc<T> => ({
  endpoint,
  registerHandler: (method, handler) => Ref.update(state.handlers, HashMap.set(method, handler)),
  registerNotification: (method, handler) =>
    Ref.update(state.notifications, HashMap.set(method, handler)),
  unregisterHandler: (method) => Ref.update(state.handlers, HashMap.remove(method)),
  unregisterNotification: (method) => Ref.update(state.notifications, HashMap.remove(method)),
  registerEvent: registerEvent(state),
  call: call(state),
  callWithTimeout: callWithTimeout(state),
  notify: notify(state),
  registerEndpointCallback: registerEndpointCallback(state),
  unregisterEndpointCallback: unregisterEndpointCallback(state),
  close: close(state),
});

const makeState = (endpoint: RpcTransport, options: JsonRpcOptions): Effect.Effect<ChannelState> =>
  Effect.all({
    endpoint: Effect.succeed(endpoint),
    name: Effect.sync(() => `jsonrpc-${randomUUID()}`),
    stopEndpointOnClose: Effect.succeed(options.stopEndpointOnClose ?? true),
    nextId: Ref.make(1),
    pending: Ref.make<PendingTable>(HashMap.empty()),
    handlers: Ref.make(HashMap.empty<string, MethodHandler>()),
    notifications: Ref.make(HashMap.empty<string, NotificationHandler>()),
    tracked: Ref.make(HashSet.empty<string>()),
    closed: Ref.make(false),
  });

/**
 * Attaches a JSON-RPC channel to `endpoint`. The channel closes with the
 * surrounding scope.
 */
export const makeJsonRpc = <T extends RpcTransport>(
  endpoint: T,
  options: JsonRpcOptions = {}
): Effect.Effect<JsonRpc<T>, never, Scope.Scope> =>
  Effect.acquireRelease(
    pipe(
      makeState(endpoint, options),
      Effect.tap((state) => registerEndpointCallback(state)(state.name, handleInbound(state))),
      Effect.map((state) => makeChannel(endpoint, state))
    ),
    (channel) => channel.close
  );

// =============================================================================
// Typed Handlers
// =============================================================================

/**
 * Decodes `params` with `schema` before calling `handler`; params that do not
 * match are answered with INVALID_PARAMS.
 */
export const withParams =
  <A, I, E>(
    schema: Schema.Schema<A, I, never>,
    handler: (params: A) => Effect.Effect<unknown, E>
  ): MethodHandler =>
  (params) =>
    pipe(
      Schema.decodeUnknown(schema)(params),
      Effect.mapError(
        (error) =>
          new RpcHandlerError({
            code: ErrorCode.INVALID_PARAMS,
            message: 'Invalid params',
            data: error.message,
          })
      ),
      Effect.flatMap(handler)
    );
