/**
 * WebSocket Connector
 *
 * The connecting endpoint role over a `ws` client socket. Owns at most one
 * connection at a time; after the peer closes it, `connect` may be called
 * again until the endpoint is stopped.
 */

import {
  Data,
  Duration,
  Effect,
  Option,
  Ref,
  Runtime,
  Scope,
  SubscriptionRef,
  pipe,
} from 'effect';
import { WebSocket, type RawData } from 'ws';
import {
  ConnectionError,
  TransportError,
  awaitCondition,
  decodeConnectorConfig,
  describeError,
  makeEndpointCore,
  type ConnectionState,
  type ConnectorConfig,
  type ConnectorConfigInput,
  type ConnectorEndpoint,
  type EndpointCore,
} from '@plotbridge/transport';
import type { ReadonlyDeep } from 'type-fest';
import { rawDataToText } from './raw-data';

// =============================================================================
// Internal State Types
// =============================================================================

type SocketPhase = Data.TaggedEnum<{
  Idle: {};
  Connecting: {};
  Active: { readonly socket: WebSocket };
  Stopped: {};
}>;

const SocketPhase = Data.taggedEnum<SocketPhase>();

interface ConnectorState {
  readonly config: ConnectorConfig;
  readonly core: EndpointCore;
  readonly runtime: Runtime.Runtime<never>;
  readonly phase: Ref.Ref<SocketPhase>;
  readonly connection: SubscriptionRef.SubscriptionRef<ConnectionState>;
}

const NORMAL_CLOSE_CODE = 1000;

// =============================================================================
// Socket Events
// =============================================================================

const releaseSocket =
  (socket: WebSocket) =>
  (phase: SocketPhase): SocketPhase =>
    SocketPhase.$is('Active')(phase) && phase.socket === socket ? SocketPhase.Idle() : phase;

const onClosed = (
  state: ConnectorState,
  socket: WebSocket,
  code: number,
  reason: string
): Effect.Effect<void> =>
  pipe(
    Ref.get(state.phase),
    Effect.flatMap((phase) =>
      // only the socket that reached `open` owns the connection state
      SocketPhase.$is('Active')(phase) && phase.socket === socket
        ? pipe(
            Ref.update(state.phase, releaseSocket(socket)),
            Effect.zipRight(SubscriptionRef.set(state.connection, 'disconnected')),
            Effect.zipRight(Effect.logInfo('Connection closed', { code, reason }))
          )
        : Effect.void
    )
  );

const attachSocket = (state: ConnectorState, socket: WebSocket): void => {
  const run = Runtime.runFork(state.runtime);

  socket.on('message', (data: RawData) => {
    Runtime.runSync(state.runtime)(state.core.handleMessage(rawDataToText(data)));
  });
  socket.on('close', (code: number, reason: Buffer) => {
    run(state.core.annotate(onClosed(state, socket, code, reason.toString('utf8'))));
  });
  socket.on('error', (error: Error) => {
    run(state.core.annotate(Effect.logDebug('Socket error', error.message)));
  });
};

// =============================================================================
// Connecting
// =============================================================================

const claimConnect = (phase: SocketPhase): readonly [Option.Option<string>, SocketPhase] =>
  SocketPhase.$match(phase, {
    Idle: () => [Option.none(), SocketPhase.Connecting()] as const,
    Connecting: () => [Option.some('Connection already in progress'), phase] as const,
    Active: () => [Option.some('Already connected'), phase] as const,
    Stopped: () => [Option.some('Endpoint has been stopped'), phase] as const,
  });

const openSocket = (url: string): Effect.Effect<WebSocket, ConnectionError> =>
  Effect.try({
    try: () => new WebSocket(url),
    catch: (error) =>
      new ConnectionError({
        message: `Invalid target: ${describeError(error)}`,
        url,
        cause: error,
      }),
  });

const awaitOpen = (socket: WebSocket, url: string): Effect.Effect<void, ConnectionError> =>
  Effect.async<void, ConnectionError>((resume) => {
    const onOpen = () => {
      cleanup();
      resume(Effect.void);
    };
    const onError = (error: Error) => {
      cleanup();
      resume(Effect.fail(new ConnectionError({ message: error.message, url, cause: error })));
    };
    const onClose = (code: number) => {
      cleanup();
      resume(
        Effect.fail(new ConnectionError({ message: `Closed during handshake (${code})`, url }))
      );
    };
    const cleanup = () => {
      socket.off('open', onOpen);
      socket.off('error', onError);
      socket.off('close', onClose);
    };

    socket.once('open', onOpen);
    socket.once('error', onError);
    socket.once('close', onClose);

    return Effect.sync(cleanup);
  });

const bindSocket =
  (socket: WebSocket) =>
  (phase: SocketPhase): readonly [boolean, SocketPhase] =>
    SocketPhase.$is('Connecting')(phase)
      ? [true, SocketPhase.Active({ socket })]
      : [false, phase];

const abandon = (socket: WebSocket): Effect.Effect<void> =>
  pipe(
    Effect.try(() => socket.terminate()),
    Effect.catchAll((error) => Effect.logDebug('Terminating socket failed', describeError(error)))
  );

const handshake = (
  state: ConnectorState,
  socket: WebSocket,
  url: string
): Effect.Effect<void, ConnectionError> =>
  pipe(
    awaitOpen(socket, url),
    Effect.timeoutFail({
      duration: Duration.millis(state.config.openTimeoutMs),
      onTimeout: () => new ConnectionError({ message: 'Connection timed out', url }),
    }),
    Effect.tapError(() => abandon(socket))
  );

const establish = (state: ConnectorState, url: string): Effect.Effect<boolean, ConnectionError> =>
  pipe(
    openSocket(url),
    Effect.tap((socket) => Effect.sync(() => attachSocket(state, socket))),
    Effect.flatMap((socket) =>
      pipe(
        Ref.modify(state.phase, bindSocket(socket)),
        Effect.flatMap((bound) =>
          bound
            ? pipe(
                SubscriptionRef.set(state.connection, 'connecting'),
                Effect.zipRight(handshake(state, socket, url)),
                Effect.zipRight(SubscriptionRef.set(state.connection, 'connected')),
                Effect.zipRight(state.core.startDispatch),
                Effect.zipRight(Effect.logInfo('Connected', { url })),
                Effect.as(true)
              )
            : pipe(
                // stopped while the socket was being created
                abandon(socket),
                Effect.as(false)
              )
        )
      )
    )
  );

const releaseAfterFailure = (phase: SocketPhase): readonly [boolean, SocketPhase] =>
  SocketPhase.$is('Stopped')(phase) ? [true, phase] : [false, SocketPhase.Idle()];

const onConnectFailure =
  (state: ConnectorState) =>
  (error: ConnectionError): Effect.Effect<boolean> =>
    pipe(
      Ref.modify(state.phase, releaseAfterFailure),
      Effect.flatMap((stopped) =>
        stopped ? Effect.void : SubscriptionRef.set(state.connection, 'error')
      ),
      Effect.zipRight(
        pipe(
          Effect.logError('Connection failed', error.message),
          Effect.annotateLogs('url', error.url)
        )
      ),
      Effect.as(false)
    );

const connect =
  (state: ConnectorState) =>
  (url: string): Effect.Effect<boolean> =>
    state.core.annotate(
      pipe(
        Ref.modify(state.phase, claimConnect),
        Effect.flatMap(
          Option.match({
            onNone: () =>
              pipe(establish(state, url), Effect.catchAll(onConnectFailure(state))),
            onSome: (reason) => pipe(Effect.logWarning(reason), Effect.as(false)),
          })
        )
      )
    );

// =============================================================================
// Messaging
// =============================================================================

const activeSocket = (phase: SocketPhase): Option.Option<WebSocket> =>
  SocketPhase.$is('Active')(phase) && phase.socket.readyState === WebSocket.OPEN
    ? Option.some(phase.socket)
    : Option.none();

const writeFrame = (socket: WebSocket, message: string): Effect.Effect<void, TransportError> =>
  Effect.async<void, TransportError>((resume) => {
    socket.send(message, (error) =>
      resume(
        error
          ? Effect.fail(new TransportError({ message: error.message, cause: error }))
          : Effect.void
      )
    );
  });

const send =
  (state: ConnectorState) =>
  (message: string): Effect.Effect<boolean> =>
    state.core.annotate(
      pipe(
        Ref.get(state.phase),
        Effect.map(activeSocket),
        Effect.flatMap(
          Option.match({
            onNone: () => pipe(Effect.logDebug('Send while not connected'), Effect.as(false)),
            onSome: (socket) =>
              pipe(
                writeFrame(socket, message),
                Effect.as(true),
                Effect.catchAll((error) =>
                  pipe(Effect.logWarning('Send failed', error.message), Effect.as(false))
                )
              ),
          })
        )
      )
    );

// =============================================================================
// Shutdown
// =============================================================================

const closeActive = (socket: WebSocket): Effect.Effect<void> =>
  pipe(
    Effect.try(() => socket.close(NORMAL_CLOSE_CODE)),
    Effect.catchAll((error) => Effect.logDebug('Closing socket failed', describeError(error)))
  );

const stopPhase = (phase: SocketPhase): readonly [SocketPhase, SocketPhase] => [
  phase,
  SocketPhase.Stopped(),
];

const stop = (state: ConnectorState): Effect.Effect<void> =>
  state.core.annotate(
    pipe(
      Ref.modify(state.phase, stopPhase),
      Effect.flatMap((previous) =>
        SocketPhase.$is('Stopped')(previous)
          ? Effect.void
          : pipe(
              SocketPhase.$is('Active')(previous) ? closeActive(previous.socket) : Effect.void,
              Effect.zipRight(SubscriptionRef.set(state.connection, 'disconnected')),
              Effect.zipRight(state.core.stopDispatch),
              Effect.zipRight(Effect.logDebug('Connector stopped'))
            )
      )
    )
  );

// =============================================================================
// Endpoint Assembly
// =============================================================================

const isConnectedState = (connectionState: ConnectionState): boolean =>
  connectionState === 'connected';

const makeEndpoint = (state: ConnectorState): ConnectorEndpoint => ({
  name: state.core.name,
  isConnected: Effect.map(SubscriptionRef.get(state.connection), isConnectedState),
  waitConnection: (timeout: Duration.DurationInput) =>
    awaitCondition(state.connection, isConnectedState, timeout),
  connectionState: state.connection.changes,
  send: send(state),
  registerCallback: state.core.registerCallback,
  unregisterCallback: state.core.unregisterCallback,
  stop: stop(state),
  connect: connect(state),
});

const makeState = (config: ConnectorConfig): Effect.Effect<ConnectorState> =>
  Effect.all({
    config: Effect.succeed(config),
    core: makeEndpointCore({
      name: config.name,
      shutdownTimeout: Duration.millis(config.shutdownTimeoutMs),
    }),
    runtime: Effect.runtime<never>(),
    phase: Ref.make<SocketPhase>(SocketPhase.Idle()),
    connection: SubscriptionRef.make<ConnectionState>('disconnected'),
  });

/**
 * Creates a connector that is stopped when the surrounding scope closes.
 */
export const makeWebSocketConnector = (
  config?: ReadonlyDeep<ConnectorConfigInput>
): Effect.Effect<ConnectorEndpoint, TransportError, Scope.Scope> =>
  Effect.acquireRelease(
    pipe(decodeConnectorConfig(config), Effect.flatMap(makeState), Effect.map(makeEndpoint)),
    (endpoint) => endpoint.stop
  );
