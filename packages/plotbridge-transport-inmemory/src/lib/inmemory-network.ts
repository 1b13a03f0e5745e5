/**
 * In-Memory Network
 *
 * An isolated, in-process substrate for acceptor and connector endpoints.
 * Acceptors bind `host:port` addresses in the network's own listener table and
 * connectors reach them through `memory://host:port` targets; frames are
 * handed straight to the other side's inbound queue. Nothing is global: each
 * call to `makeInMemoryNetwork` yields a separate address space.
 */

import { randomUUID } from 'node:crypto';
import {
  Data,
  Duration,
  Effect,
  HashMap,
  Option,
  Ref,
  Scope,
  Stream,
  SubscriptionRef,
  pipe,
} from 'effect';
import {
  ConnectionError,
  PeerId,
  TransportError,
  awaitCondition,
  broadcastToPeers,
  decodeAcceptorConfig,
  decodeConnectorConfig,
  makeEndpointCore,
  type AcceptorConfig,
  type AcceptorConfigInput,
  type AcceptorEndpoint,
  type ConnectionState,
  type ConnectorConfig,
  type ConnectorConfigInput,
  type ConnectorEndpoint,
  type EndpointCore,
  type ServeTarget,
} from '@plotbridge/transport';
import type { ReadonlyDeep } from 'type-fest';

// =============================================================================
// Network Types
// =============================================================================

/**
 * One side of a link as seen from the other side.
 */
interface RemoteSide {
  readonly deliver: (message: string) => Effect.Effect<boolean>;
  readonly hangUp: Effect.Effect<void>;
}

interface Listener {
  readonly accept: (remote: RemoteSide) => Effect.Effect<Option.Option<RemoteSide>>;
}

interface ListenerTable {
  readonly listeners: HashMap.HashMap<string, Listener>;
  readonly nextEphemeralPort: number;
}

const FIRST_EPHEMERAL_PORT = 49152;
const MEMORY_TARGET = /^memory:\/\/([^:/]+):(\d+)$/;

export type InMemoryConnectorConfigInput = Omit<ConnectorConfigInput, 'openTimeoutMs'>;

export interface InMemoryNetwork {
  readonly makeAcceptor: (
    config?: ReadonlyDeep<AcceptorConfigInput>
  ) => Effect.Effect<AcceptorEndpoint, TransportError, Scope.Scope>;
  readonly makeConnector: (
    config?: ReadonlyDeep<InMemoryConnectorConfigInput>
  ) => Effect.Effect<ConnectorEndpoint, TransportError, Scope.Scope>;
}

// =============================================================================
// Listener Table
// =============================================================================

const addressOf = (host: string, port: number): string => `${host}:${port}`;

export const memoryUrl = (host: string, port: number): string =>
  `memory://${addressOf(host, port)}`;

const firstFreePort = (table: ListenerTable, host: string, candidate: number): number =>
  HashMap.has(table.listeners, addressOf(host, candidate))
    ? firstFreePort(table, host, candidate + 1)
    : candidate;

const bindListener =
  (host: string, requestedPort: number, listener: Listener) =>
  (table: ListenerTable): readonly [Option.Option<number>, ListenerTable] => {
    const port =
      requestedPort === 0 ? firstFreePort(table, host, table.nextEphemeralPort) : requestedPort;
    const address = addressOf(host, port);

    return HashMap.has(table.listeners, address)
      ? [Option.none(), table]
      : [
          Option.some(port),
          {
            listeners: HashMap.set(table.listeners, address, listener),
            nextEphemeralPort:
              requestedPort === 0 ? port + 1 : table.nextEphemeralPort,
          },
        ];
  };

const unbindListener =
  (address: string) =>
  (table: ListenerTable): ListenerTable => ({
    ...table,
    listeners: HashMap.remove(table.listeners, address),
  });

const dial = (
  table: Ref.Ref<ListenerTable>,
  address: string,
  remote: RemoteSide
): Effect.Effect<Option.Option<RemoteSide>> =>
  pipe(
    Ref.get(table),
    Effect.flatMap((current) =>
      Option.match(HashMap.get(current.listeners, address), {
        onNone: () => Effect.succeed(Option.none()),
        onSome: (listener) => listener.accept(remote),
      })
    )
  );

// =============================================================================
// Acceptor
// =============================================================================

type AcceptorPhase = Data.TaggedEnum<{
  Idle: {};
  Starting: {};
  Serving: { readonly address: string; readonly port: number };
  Stopped: {};
}>;

const AcceptorPhase = Data.taggedEnum<AcceptorPhase>();

type Peers = HashMap.HashMap<PeerId, RemoteSide>;

interface AcceptorState {
  readonly config: AcceptorConfig;
  readonly core: EndpointCore;
  readonly table: Ref.Ref<ListenerTable>;
  readonly phase: Ref.Ref<AcceptorPhase>;
  readonly peers: SubscriptionRef.SubscriptionRef<Peers>;
}

const hasPeers = (peers: Peers): boolean => !HashMap.isEmpty(peers);

const removePeer = (state: AcceptorState, id: PeerId): Effect.Effect<void> =>
  state.core.annotate(
    pipe(
      SubscriptionRef.update(state.peers, HashMap.remove(id)),
      Effect.zipRight(Effect.logDebug('Peer disconnected')),
      Effect.annotateLogs('peer', id)
    )
  );

const acceptorSide = (state: AcceptorState, id: PeerId): RemoteSide => ({
  deliver: (message) =>
    pipe(
      SubscriptionRef.get(state.peers),
      Effect.flatMap((peers) =>
        HashMap.has(peers, id)
          ? pipe(state.core.handleMessage(message), Effect.as(true))
          : Effect.succeed(false)
      )
    ),
  hangUp: removePeer(state, id),
});

const admitPeer =
  (state: AcceptorState) =>
  (remote: RemoteSide): Effect.Effect<Option.Option<RemoteSide>> =>
    pipe(
      Ref.get(state.phase),
      Effect.flatMap((phase) => {
        if (!AcceptorPhase.$is('Serving')(phase)) {
          return Effect.succeed(Option.none());
        }
        const id = PeerId(randomUUID());
        return pipe(
          SubscriptionRef.update(state.peers, HashMap.set(id, remote)),
          Effect.zipRight(
            state.core.annotate(pipe(Effect.logDebug('Peer connected'), Effect.annotateLogs('peer', id)))
          ),
          Effect.as(Option.some(acceptorSide(state, id)))
        );
      })
    );

const isValidPort = (port: number): boolean => Number.isInteger(port) && port >= 0 && port <= 65535;

const claimStart = (phase: AcceptorPhase): readonly [Option.Option<string>, AcceptorPhase] =>
  AcceptorPhase.$match(phase, {
    Idle: () => [Option.none(), AcceptorPhase.Starting()] as const,
    Starting: () => [Option.some('Server is already starting'), phase] as const,
    Serving: () => [Option.some('Server is already running'), phase] as const,
    Stopped: () => [Option.some('Endpoint has been stopped'), phase] as const,
  });

const completeStart =
  (address: string, port: number) =>
  (phase: AcceptorPhase): readonly [boolean, AcceptorPhase] =>
    AcceptorPhase.$is('Starting')(phase)
      ? [true, AcceptorPhase.Serving({ address, port })]
      : [false, phase];

const abandonStart = (phase: AcceptorPhase): AcceptorPhase =>
  AcceptorPhase.$is('Starting')(phase) ? AcceptorPhase.Idle() : phase;

const onBound =
  (state: AcceptorState, host: string) =>
  (port: number): Effect.Effect<boolean> => {
    const address = addressOf(host, port);
    return pipe(
      Ref.modify(state.phase, completeStart(address, port)),
      Effect.flatMap((accepted) =>
        accepted
          ? pipe(
              state.core.startDispatch,
              Effect.zipRight(Effect.logInfo('Server listening', { port })),
              Effect.as(true)
            )
          : pipe(
              // stopped while binding
              Ref.update(state.table, unbindListener(address)),
              Effect.zipRight(Effect.logWarning('Endpoint stopped before the server started')),
              Effect.as(false)
            )
      )
    );
  };

const bindAndServe = (state: AcceptorState, target: ServeTarget): Effect.Effect<boolean> => {
  const host = target.host ?? state.config.host;
  return pipe(
    Ref.modify(state.table, bindListener(host, target.port, { accept: admitPeer(state) })),
    Effect.flatMap(
      Option.match({
        onNone: () =>
          pipe(
            Ref.update(state.phase, abandonStart),
            Effect.zipRight(
              Effect.logError('Address already in use', { address: addressOf(host, target.port) })
            ),
            Effect.as(false)
          ),
        onSome: onBound(state, host),
      })
    )
  );
};

const serve =
  (state: AcceptorState) =>
  (target: ReadonlyDeep<ServeTarget>): Effect.Effect<boolean> =>
    state.core.annotate(
      isValidPort(target.port)
        ? pipe(
            Ref.modify(state.phase, claimStart),
            Effect.flatMap(
              Option.match({
                onNone: () => bindAndServe(state, target),
                onSome: (reason) => pipe(Effect.logWarning(reason), Effect.as(false)),
              })
            )
          )
        : pipe(Effect.logError('Invalid port', { port: target.port }), Effect.as(false))
    );

const deliverTo =
  (message: string) =>
  (remote: RemoteSide): Effect.Effect<void, TransportError> =>
    pipe(
      remote.deliver(message),
      Effect.filterOrFail(
        (delivered) => delivered,
        () => new TransportError({ message: 'Peer is no longer connected' })
      ),
      Effect.asVoid
    );

const broadcast =
  (state: AcceptorState) =>
  (message: string): Effect.Effect<boolean> =>
    state.core.annotate(
      pipe(
        SubscriptionRef.get(state.peers),
        Effect.flatMap((peers) => broadcastToPeers(peers, deliverTo(message)))
      )
    );

const stopAcceptor = (state: AcceptorState): Effect.Effect<void> =>
  state.core.annotate(
    pipe(
      Ref.getAndSet(state.phase, AcceptorPhase.Stopped()),
      Effect.flatMap((previous) =>
        AcceptorPhase.$is('Stopped')(previous)
          ? Effect.void
          : pipe(
              AcceptorPhase.$is('Serving')(previous)
                ? Ref.update(state.table, unbindListener(previous.address))
                : Effect.void,
              Effect.zipRight(SubscriptionRef.getAndSet(state.peers, HashMap.empty())),
              Effect.flatMap((peers) =>
                Effect.forEach(HashMap.values(peers), (remote) => remote.hangUp, { discard: true })
              ),
              Effect.zipRight(state.core.stopDispatch),
              Effect.zipRight(Effect.logDebug('Acceptor stopped'))
            )
      )
    )
  );

const toConnectionState = (peers: Peers): ConnectionState =>
  hasPeers(peers) ? 'connected' : 'disconnected';

const makeAcceptorEndpoint = (state: AcceptorState): AcceptorEndpoint => ({
  name: state.core.name,
  isConnected: Effect.map(SubscriptionRef.get(state.peers), hasPeers),
  waitConnection: (timeout: Duration.DurationInput) =>
    awaitCondition(state.peers, hasPeers, timeout),
  connectionState: pipe(state.peers.changes, Stream.map(toConnectionState), Stream.changes),
  send: broadcast(state),
  registerCallback: state.core.registerCallback,
  unregisterCallback: state.core.unregisterCallback,
  stop: stopAcceptor(state),
  serve: serve(state),
  port: Effect.map(
    Ref.get(state.phase),
    (phase): Option.Option<number> =>
      AcceptorPhase.$is('Serving')(phase) ? Option.some(phase.port) : Option.none()
  ),
  peerCount: Effect.map(SubscriptionRef.get(state.peers), HashMap.size),
  waitUntilNoPeers: (timeout?: Duration.DurationInput) =>
    awaitCondition(state.peers, HashMap.isEmpty, timeout),
});

const makeAcceptorState = (
  table: Ref.Ref<ListenerTable>,
  config: AcceptorConfig
): Effect.Effect<AcceptorState> =>
  Effect.all({
    config: Effect.succeed(config),
    core: makeEndpointCore({
      name: config.name,
      shutdownTimeout: Duration.millis(config.shutdownTimeoutMs),
    }),
    table: Effect.succeed(table),
    phase: Ref.make<AcceptorPhase>(AcceptorPhase.Idle()),
    peers: SubscriptionRef.make<Peers>(HashMap.empty()),
  });

// =============================================================================
// Connector
// =============================================================================

type ConnectorPhase = Data.TaggedEnum<{
  Idle: {};
  Connecting: { readonly link: PeerId };
  Active: { readonly link: PeerId; readonly remote: RemoteSide };
  Stopped: {};
}>;

const ConnectorPhase = Data.taggedEnum<ConnectorPhase>();

interface ConnectorState {
  readonly core: EndpointCore;
  readonly table: Ref.Ref<ListenerTable>;
  readonly phase: Ref.Ref<ConnectorPhase>;
  readonly connection: SubscriptionRef.SubscriptionRef<ConnectionState>;
}

const ownsLink = (phase: ConnectorPhase, link: PeerId): boolean =>
  ConnectorPhase.$is('Active')(phase) && phase.link === link;

const connectorSide = (state: ConnectorState, link: PeerId): RemoteSide => ({
  deliver: (message) =>
    pipe(
      Ref.get(state.phase),
      Effect.flatMap((phase) =>
        ownsLink(phase, link)
          ? pipe(state.core.handleMessage(message), Effect.as(true))
          : Effect.succeed(false)
      )
    ),
  hangUp: state.core.annotate(
    pipe(
      Ref.modify(state.phase, (phase): readonly [boolean, ConnectorPhase] =>
        ownsLink(phase, link) ? [true, ConnectorPhase.Idle()] : [false, phase]
      ),
      Effect.flatMap((owned) =>
        owned
          ? pipe(
              SubscriptionRef.set(state.connection, 'disconnected'),
              Effect.zipRight(Effect.logInfo('Connection closed by peer'))
            )
          : Effect.void
      )
    )
  ),
});

const claimConnect =
  (link: PeerId) =>
  (phase: ConnectorPhase): readonly [Option.Option<string>, ConnectorPhase] =>
    ConnectorPhase.$match(phase, {
      Idle: () => [Option.none(), ConnectorPhase.Connecting({ link })] as const,
      Connecting: () => [Option.some('Connection already in progress'), phase] as const,
      Active: () => [Option.some('Already connected'), phase] as const,
      Stopped: () => [Option.some('Endpoint has been stopped'), phase] as const,
    });

const parseTarget = (url: string): Effect.Effect<string, ConnectionError> => {
  const match = MEMORY_TARGET.exec(url);
  const host = match?.[1];
  const port = match?.[2];
  return host === undefined || port === undefined
    ? Effect.fail(new ConnectionError({ message: `Invalid target: ${url}`, url }))
    : Effect.succeed(addressOf(host, Number(port)));
};

const activate =
  (link: PeerId, remote: RemoteSide) =>
  (phase: ConnectorPhase): readonly [boolean, ConnectorPhase] =>
    ConnectorPhase.$is('Connecting')(phase) && phase.link === link
      ? [true, ConnectorPhase.Active({ link, remote })]
      : [false, phase];

const complete = (
  state: ConnectorState,
  link: PeerId,
  remote: RemoteSide,
  url: string
): Effect.Effect<boolean> =>
  pipe(
    Ref.modify(state.phase, activate(link, remote)),
    Effect.flatMap((activated) =>
      activated
        ? pipe(
            SubscriptionRef.set(state.connection, 'connected'),
            Effect.zipRight(state.core.startDispatch),
            Effect.zipRight(Effect.logInfo('Connected', { url })),
            Effect.as(true)
          )
        : pipe(remote.hangUp, Effect.as(false))
    )
  );

const establish = (state: ConnectorState, link: PeerId, url: string) =>
  pipe(
    parseTarget(url),
    Effect.tap(() => SubscriptionRef.set(state.connection, 'connecting')),
    Effect.flatMap((address) => dial(state.table, address, connectorSide(state, link))),
    Effect.flatMap(
      Option.match({
        onNone: () =>
          Effect.fail(new ConnectionError({ message: 'Connection refused', url })),
        onSome: (remote) => complete(state, link, remote, url),
      })
    )
  );

const releaseAfterFailure = (phase: ConnectorPhase): readonly [boolean, ConnectorPhase] =>
  ConnectorPhase.$is('Stopped')(phase) ? [true, phase] : [false, ConnectorPhase.Idle()];

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
  (url: string): Effect.Effect<boolean> => {
    const link = PeerId(randomUUID());
    return state.core.annotate(
      pipe(
        Ref.modify(state.phase, claimConnect(link)),
        Effect.flatMap(
          Option.match({
            onNone: () =>
              pipe(establish(state, link, url), Effect.catchAll(onConnectFailure(state))),
            onSome: (reason) => pipe(Effect.logWarning(reason), Effect.as(false)),
          })
        )
      )
    );
  };

const sendToAcceptor =
  (state: ConnectorState) =>
  (message: string): Effect.Effect<boolean> =>
    state.core.annotate(
      pipe(
        Ref.get(state.phase),
        Effect.flatMap((phase) =>
          ConnectorPhase.$is('Active')(phase)
            ? phase.remote.deliver(message)
            : pipe(Effect.logDebug('Send while not connected'), Effect.as(false))
        )
      )
    );

const stopConnector = (state: ConnectorState): Effect.Effect<void> =>
  state.core.annotate(
    pipe(
      Ref.getAndSet(state.phase, ConnectorPhase.Stopped()),
      Effect.flatMap((previous) =>
        ConnectorPhase.$is('Stopped')(previous)
          ? Effect.void
          : pipe(
              ConnectorPhase.$is('Active')(previous) ? previous.remote.hangUp : Effect.void,
              Effect.zipRight(SubscriptionRef.set(state.connection, 'disconnected')),
              Effect.zipRight(state.core.stopDispatch),
              Effect.zipRight(Effect.logDebug('Connector stopped'))
            )
      )
    )
  );

const isConnectedState = (connectionState: ConnectionState): boolean =>
  connectionState === 'connected';

const makeConnectorEndpoint = (state: ConnectorState): ConnectorEndpoint => ({
  name: state.core.name,
  isConnected: Effect.map(SubscriptionRef.get(state.connection), isConnectedState),
  waitConnection: (timeout: Duration.DurationInput) =>
    awaitCondition(state.connection, isConnectedState, timeout),
  connectionState: state.connection.changes,
  send: sendToAcceptor(state),
  registerCallback: state.core.registerCallback,
  unregisterCallback: state.core.unregisterCallback,
  stop: stopConnector(state),
  connect: connect(state),
});

const makeConnectorState = (
  table: Ref.Ref<ListenerTable>,
  config: ConnectorConfig
): Effect.Effect<ConnectorState> =>
  Effect.all({
    core: makeEndpointCore({
      name: config.name,
      shutdownTimeout: Duration.millis(config.shutdownTimeoutMs),
    }),
    table: Effect.succeed(table),
    phase: Ref.make<ConnectorPhase>(ConnectorPhase.Idle()),
    connection: SubscriptionRef.make<ConnectionState>('disconnected'),
  });

// =============================================================================
// Network
// =============================================================================

const networkOf = (table: Ref.Ref<ListenerTable>): InMemoryNetwork => ({
  makeAcceptor: (config) =>
    Effect.acquireRelease(
      pipe(
        decodeAcceptorConfig(config),
        Effect.flatMap((decoded) => makeAcceptorState(table, decoded)),
        Effect.map(makeAcceptorEndpoint)
      ),
      (endpoint) => endpoint.stop
    ),
  makeConnector: (config) =>
    Effect.acquireRelease(
      pipe(
        decodeConnectorConfig(config),
        Effect.flatMap((decoded) => makeConnectorState(table, decoded)),
        Effect.map(makeConnectorEndpoint)
      ),
      (endpoint) => endpoint.stop
    ),
});

export const makeInMemoryNetwork = (): Effect.Effect<InMemoryNetwork> =>
  pipe(
    Ref.make<ListenerTable>({
      listeners: HashMap.empty(),
      nextEphemeralPort: FIRST_EPHEMERAL_PORT,
    }),
    Effect.map(networkOf)
  );
