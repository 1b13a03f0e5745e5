/**
 * WebSocket Acceptor
 *
 * The accepting endpoint role over the `ws` server. Accepted sockets become
 * peers; `send` broadcasts to all of them and every inbound frame from any
 * peer is queued for the endpoint's dispatch fiber.
 *
 * Socket events arrive on plain event-emitter callbacks; they are bridged into
 * Effect through the runtime captured when the acceptor was made, so log
 * levels and loggers provided by the caller apply to them too.
 */

import type { IncomingMessage } from 'node:http';
import { randomUUID } from 'node:crypto';
import {
  Data,
  Duration,
  Effect,
  HashMap,
  Option,
  Ref,
  Runtime,
  Scope,
  Stream,
  SubscriptionRef,
  pipe,
} from 'effect';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import {
  PeerId,
  ServerStartError,
  TransportError,
  awaitCondition,
  broadcastToPeers,
  decodeAcceptorConfig,
  describeError,
  makeEndpointCore,
  type AcceptorConfig,
  type AcceptorConfigInput,
  type AcceptorEndpoint,
  type ConnectionState,
  type EndpointCore,
  type ServeTarget,
} from '@plotbridge/transport';
import type { ReadonlyDeep } from 'type-fest';
import { rawDataToText } from './raw-data';

// =============================================================================
// Internal State Types
// =============================================================================

type ServerPhase = Data.TaggedEnum<{
  Idle: {};
  Starting: {};
  Serving: { readonly server: WebSocketServer; readonly port: number };
  Stopped: {};
}>;

const ServerPhase = Data.taggedEnum<ServerPhase>();

type Peers = HashMap.HashMap<PeerId, WebSocket>;

interface AcceptorState {
  readonly config: AcceptorConfig;
  readonly core: EndpointCore;
  readonly runtime: Runtime.Runtime<never>;
  readonly phase: Ref.Ref<ServerPhase>;
  readonly peers: SubscriptionRef.SubscriptionRef<Peers>;
}

const SHUTDOWN_CLOSE_CODE = 1001;
const SHUTDOWN_CLOSE_REASON = 'Server shutting down';

// =============================================================================
// Peer Tracking
// =============================================================================

const addPeer = (state: AcceptorState, id: PeerId, socket: WebSocket): Effect.Effect<void> =>
  pipe(
    SubscriptionRef.update(state.peers, HashMap.set(id, socket)),
    Effect.zipRight(Effect.logDebug('Peer connected')),
    Effect.annotateLogs('peer', id)
  );

const removePeer = (state: AcceptorState, id: PeerId, code: number): Effect.Effect<void> =>
  pipe(
    SubscriptionRef.update(state.peers, HashMap.remove(id)),
    Effect.zipRight(Effect.logDebug('Peer disconnected')),
    Effect.annotateLogs({ peer: id, code })
  );

const closeSocket = (socket: WebSocket): Effect.Effect<void> =>
  pipe(
    Effect.try(() => socket.close(SHUTDOWN_CLOSE_CODE, SHUTDOWN_CLOSE_REASON)),
    Effect.catchAll((error) => Effect.logDebug('Closing peer socket failed', describeError(error)))
  );

const isStopped = (state: AcceptorState): Effect.Effect<boolean> =>
  Effect.map(Ref.get(state.phase), ServerPhase.$is('Stopped'));

/**
 * Wires one accepted socket into the endpoint. Runs synchronously inside the
 * server's `connection` event.
 */
const attachPeer = (state: AcceptorState, socket: WebSocket, request: IncomingMessage): void => {
  const run = Runtime.runFork(state.runtime);
  const id = PeerId(randomUUID());

  request.socket.setNoDelay(true);

  // Enqueueing is synchronous, so frames keep their arrival order.
  socket.on('message', (data: RawData) => {
    Runtime.runSync(state.runtime)(state.core.handleMessage(rawDataToText(data)));
  });
  socket.on('close', (code: number) => {
    run(state.core.annotate(removePeer(state, id, code)));
  });
  socket.on('error', (error: Error) => {
    run(
      state.core.annotate(
        pipe(Effect.logWarning('Peer socket error', error.message), Effect.annotateLogs('peer', id))
      )
    );
  });

  run(
    state.core.annotate(
      pipe(
        isStopped(state),
        Effect.flatMap((stopped) => (stopped ? closeSocket(socket) : addPeer(state, id, socket)))
      )
    )
  );
};

// =============================================================================
// Server Lifecycle
// =============================================================================

const isValidPort = (port: number): boolean => Number.isInteger(port) && port >= 0 && port <= 65535;

const boundPort = (server: WebSocketServer, requested: number): number => {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : requested;
};

const SERVER_CLOSE_TIMEOUT = Duration.seconds(5);

const closeServer = (server: WebSocketServer): Effect.Effect<void> =>
  pipe(
    Effect.async<void>((resume) => {
      server.close(() => resume(Effect.void));
    }),
    Effect.timeoutOption(SERVER_CLOSE_TIMEOUT),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.logWarning('Server did not close in time'),
        onSome: () => Effect.void,
      })
    )
  );

const listen = (
  state: AcceptorState,
  host: string,
  port: number
): Effect.Effect<{ readonly server: WebSocketServer; readonly port: number }, ServerStartError> =>
  Effect.async<{ readonly server: WebSocketServer; readonly port: number }, ServerStartError>(
    (resume) => {
      const fail = (error: unknown) =>
        resume(
          Effect.fail(
            new ServerStartError({
              message: `Failed to listen on ${host}:${port}: ${describeError(error)}`,
              cause: error,
            })
          )
        );

      try {
        const server = new WebSocketServer({ host, port });
        const onStartError = (error: Error) => {
          server.close();
          fail(error);
        };

        server.once('error', onStartError);
        server.once('listening', () => {
          server.off('error', onStartError);
          server.on('error', (error: Error) => {
            Runtime.runFork(state.runtime)(
              state.core.annotate(Effect.logError('Server error', error.message))
            );
          });
          resume(Effect.succeed({ server, port: boundPort(server, port) }));
        });
        server.on('connection', (socket: WebSocket, request: IncomingMessage) =>
          attachPeer(state, socket, request)
        );
      } catch (error) {
        fail(error);
      }
    }
  );

const claimStart = (phase: ServerPhase): readonly [Option.Option<string>, ServerPhase] =>
  ServerPhase.$match(phase, {
    Idle: () => [Option.none(), ServerPhase.Starting()] as const,
    Starting: () => [Option.some('Server is already starting'), phase] as const,
    Serving: () => [Option.some('Server is already running'), phase] as const,
    Stopped: () => [Option.some('Endpoint has been stopped'), phase] as const,
  });

const completeStart =
  (started: { readonly server: WebSocketServer; readonly port: number }) =>
  (phase: ServerPhase): readonly [boolean, ServerPhase] =>
    ServerPhase.$is('Starting')(phase)
      ? [true, ServerPhase.Serving(started)]
      : [false, phase];

const onListening =
  (state: AcceptorState) =>
  (started: { readonly server: WebSocketServer; readonly port: number }): Effect.Effect<boolean> =>
    pipe(
      Ref.modify(state.phase, completeStart(started)),
      Effect.flatMap((accepted) =>
        accepted
          ? pipe(
              state.core.startDispatch,
              Effect.zipRight(Effect.logInfo('Server listening', { port: started.port })),
              Effect.as(true)
            )
          : pipe(
              // stopped while binding
              closeServer(started.server),
              Effect.zipRight(Effect.logWarning('Endpoint stopped before the server started')),
              Effect.as(false)
            )
      )
    );

const onListenFailure =
  (state: AcceptorState) =>
  (error: ServerStartError): Effect.Effect<boolean> =>
    pipe(
      Ref.update(state.phase, (phase) =>
        ServerPhase.$is('Starting')(phase) ? ServerPhase.Idle() : phase
      ),
      Effect.zipRight(Effect.logError(error.message)),
      Effect.as(false)
    );

const startServing = (state: AcceptorState, target: ServeTarget): Effect.Effect<boolean> => {
  const host = target.host ?? state.config.host;
  return pipe(
    listen(state, host, target.port),
    Effect.matchEffect({
      onFailure: onListenFailure(state),
      onSuccess: onListening(state),
    })
  );
};

const serve =
  (state: AcceptorState) =>
  (target: ReadonlyDeep<ServeTarget>): Effect.Effect<boolean> =>
    isValidPort(target.port)
      ? pipe(
          Ref.modify(state.phase, claimStart),
          Effect.flatMap(
            Option.match({
              onNone: () => startServing(state, target),
              onSome: (reason) => pipe(Effect.logWarning(reason), Effect.as(false)),
            })
          ),
          state.core.annotate
        )
      : state.core.annotate(
          pipe(Effect.logError('Invalid port', { port: target.port }), Effect.as(false))
        );

const stopPhase = (phase: ServerPhase): readonly [ServerPhase, ServerPhase] => [
  phase,
  ServerPhase.Stopped(),
];

const closePeers = (state: AcceptorState): Effect.Effect<void> =>
  pipe(
    SubscriptionRef.getAndSet(state.peers, HashMap.empty()),
    Effect.flatMap((peers) => Effect.forEach(HashMap.values(peers), closeSocket, { discard: true }))
  );

const haltIo =
  (state: AcceptorState) =>
  (previous: ServerPhase): Effect.Effect<void> =>
    ServerPhase.$match(previous, {
      Idle: () => Effect.void,
      Starting: () => Effect.void,
      Serving: ({ server }) => pipe(closePeers(state), Effect.zipRight(closeServer(server))),
      Stopped: () => Effect.void,
    });

const stop = (state: AcceptorState): Effect.Effect<void> =>
  state.core.annotate(
    pipe(
      Ref.modify(state.phase, stopPhase),
      Effect.flatMap((previous) =>
        ServerPhase.$is('Stopped')(previous)
          ? Effect.void
          : pipe(
              haltIo(state)(previous),
              Effect.zipRight(state.core.stopDispatch),
              Effect.zipRight(Effect.logDebug('Acceptor stopped'))
            )
      )
    )
  );

// =============================================================================
// Messaging
// =============================================================================

const sendToPeer =
  (message: string) =>
  (socket: WebSocket): Effect.Effect<void, TransportError> =>
    Effect.async<void, TransportError>((resume) => {
      if (socket.readyState !== WebSocket.OPEN) {
        resume(Effect.fail(new TransportError({ message: 'Peer socket is not open' })));
        return;
      }
      socket.send(message, (error) =>
        resume(
          error
            ? Effect.fail(new TransportError({ message: error.message, cause: error }))
            : Effect.void
        )
      );
    });

const broadcast =
  (state: AcceptorState) =>
  (message: string): Effect.Effect<boolean> =>
    state.core.annotate(
      pipe(
        SubscriptionRef.get(state.peers),
        Effect.flatMap((peers) => broadcastToPeers(peers, sendToPeer(message)))
      )
    );

// =============================================================================
// Endpoint Assembly
// =============================================================================

const hasPeers = (peers: Peers): boolean => !HashMap.isEmpty(peers);

const toConnectionState = (peers: Peers): ConnectionState =>
  hasPeers(peers) ? 'connected' : 'disconnected';

const makeEndpoint = (state: AcceptorState): AcceptorEndpoint => ({
  name: state.core.name,
  isConnected: Effect.map(SubscriptionRef.get(state.peers), hasPeers),
  waitConnection: (timeout: Duration.DurationInput) =>
    awaitCondition(state.peers, hasPeers, timeout),
  connectionState: pipe(state.peers.changes, Stream.map(toConnectionState), Stream.changes),
  send: broadcast(state),
  registerCallback: state.core.registerCallback,
  unregisterCallback: state.core.unregisterCallback,
  stop: stop(state),
  serve: serve(state),
  port: Effect.map(
    Ref.get(state.phase),
    (phase): Option.Option<number> =>
      ServerPhase.$is('Serving')(phase) ? Option.some(phase.port) : Option.none()
  ),
  peerCount: Effect.map(SubscriptionRef.get(state.peers), HashMap.size),
  waitUntilNoPeers: (timeout?: Duration.DurationInput) =>
    awaitCondition(state.peers, HashMap.isEmpty, timeout),
});

const makeState = (config: AcceptorConfig): Effect.Effect<AcceptorState> =>
  Effect.all({
    config: Effect.succeed(config),
    core: makeEndpointCore({
      name: config.name,
      shutdownTimeout: Duration.millis(config.shutdownTimeoutMs),
    }),
    runtime: Effect.runtime<never>(),
    phase: Ref.make<ServerPhase>(ServerPhase.Idle()),
    peers: SubscriptionRef.make<Peers>(HashMap.empty()),
  });

/**
 * Creates an acceptor that is stopped when the surrounding scope closes.
 * Call `serve` to start listening.
 */
export const makeWebSocketAcceptor = (
  config?: ReadonlyDeep<AcceptorConfigInput>
): Effect.Effect<AcceptorEndpoint, TransportError, Scope.Scope> =>
  Effect.acquireRelease(
    pipe(decodeAcceptorConfig(config), Effect.flatMap(makeState), Effect.map(makeEndpoint)),
    (endpoint) => endpoint.stop
  );
