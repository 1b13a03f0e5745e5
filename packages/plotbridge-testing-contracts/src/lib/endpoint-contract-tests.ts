/**
 * Endpoint Contract Tests
 *
 * Behaviors every acceptor/connector implementation must share: connection
 * establishment and loss, ordered delivery, broadcast, callback registration
 * and the terminal, idempotent `stop`.
 *
 * A transport runs them by supplying an {@link EndpointTestContext}; see the
 * integration suites of the websocket and in-memory transport packages.
 */

import { describe, test, expect, beforeEach } from '@effect/vitest';
import { Deferred, Effect, Option, Scope, Stream, pipe } from 'effect';
import {
  silentLogger,
  type AcceptorEndpoint,
  type ConnectorEndpoint,
  type TransportError,
} from '@plotbridge/transport';
import { DEFAULT_WAIT, expectTrue, recordMessages, serveEphemeral } from './endpoint-test-utilities';

// =============================================================================
// Test Context Interface
// =============================================================================

/**
 * Factories for endpoints that can reach each other.
 */
export interface EndpointPair {
  readonly makeAcceptor: () => Effect.Effect<AcceptorEndpoint, TransportError, Scope.Scope>;
  readonly makeConnector: () => Effect.Effect<ConnectorEndpoint, TransportError, Scope.Scope>;
  // Connector target for an acceptor bound to `port`
  readonly targetFor: (port: number) => string;
}

export interface EndpointTestContext {
  readonly makeEndpointPair: () => EndpointPair;
}

export type EndpointTestRunner = (
  name: string,
  setup: () => Effect.Effect<EndpointTestContext>
) => void;

// =============================================================================
// Contract Tests Implementation
// =============================================================================

const run = (program: Effect.Effect<void, Error | TransportError, Scope.Scope>): Promise<void> =>
  Effect.runPromise(pipe(program, Effect.scoped, Effect.provide(silentLogger)));

const connectedPair = (pair: EndpointPair) =>
  Effect.gen(function* () {
    const acceptor = yield* pair.makeAcceptor();
    const port = yield* serveEphemeral(acceptor);
    const connector = yield* pair.makeConnector();
    yield* pipe(connector.connect(pair.targetFor(port)), Effect.flatMap(expectTrue('connect')));
    yield* pipe(acceptor.waitConnection(DEFAULT_WAIT), Effect.flatMap(expectTrue('a peer')));
    return { acceptor, connector, port };
  });

const awaitState = (connector: ConnectorEndpoint, state: string) =>
  pipe(
    connector.connectionState,
    Stream.filter((current) => current === state),
    Stream.runHead,
    Effect.timeoutFail({
      duration: DEFAULT_WAIT,
      onTimeout: () => new Error(`Timed out waiting for state ${state}`),
    })
  );

export const runEndpointContractTests: EndpointTestRunner = (
  name: string,
  setup: () => Effect.Effect<EndpointTestContext>
) => {
  describe(`${name} Endpoint Contract`, () => {
    let context: EndpointTestContext;

    beforeEach(async () => {
      context = await Effect.runPromise(setup());
    });

    describe('Connection Management', () => {
      test('connects and reports the connection on both sides', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());

            expect(yield* connector.waitConnection(DEFAULT_WAIT)).toBe(true);
            expect(yield* connector.isConnected).toBe(true);
            expect(yield* acceptor.isConnected).toBe(true);
            expect(yield* acceptor.peerCount).toBe(1);
            expect(yield* Stream.runHead(connector.connectionState)).toEqual(
              Option.some('connected')
            );
          })
        ));

      test('counts every connected peer', () =>
        run(
          Effect.gen(function* () {
            const pair = context.makeEndpointPair();
            const acceptor = yield* pair.makeAcceptor();
            const port = yield* serveEphemeral(acceptor);
            const first = yield* pair.makeConnector();
            const second = yield* pair.makeConnector();

            expect(yield* first.connect(pair.targetFor(port))).toBe(true);
            expect(yield* second.connect(pair.targetFor(port))).toBe(true);
            yield* Effect.sleep(50);

            expect(yield* acceptor.peerCount).toBe(2);
          })
        ));

      test('fails to connect when nothing is listening', () =>
        run(
          Effect.gen(function* () {
            const pair = context.makeEndpointPair();
            const acceptor = yield* pair.makeAcceptor();
            const port = yield* serveEphemeral(acceptor);
            yield* acceptor.stop;
            const connector = yield* pair.makeConnector();

            expect(yield* connector.connect(pair.targetFor(port))).toBe(false);
            expect(yield* connector.isConnected).toBe(false);
            expect(yield* connector.waitConnection('20 millis')).toBe(false);
          })
        ));

      test('refuses a second connect while connected', () =>
        run(
          Effect.gen(function* () {
            const pair = context.makeEndpointPair();
            const { connector, port } = yield* connectedPair(pair);

            expect(yield* connector.connect(pair.targetFor(port))).toBe(false);
            expect(yield* connector.isConnected).toBe(true);
          })
        ));

      test('refuses to serve twice', () =>
        run(
          Effect.gen(function* () {
            const acceptor = yield* context.makeEndpointPair().makeAcceptor();
            yield* serveEphemeral(acceptor);

            expect(yield* acceptor.serve({ port: 0 })).toBe(false);
          })
        ));

      test('rejects an out-of-range port', () =>
        run(
          Effect.gen(function* () {
            const acceptor = yield* context.makeEndpointPair().makeAcceptor();

            expect(yield* acceptor.serve({ port: 70000 })).toBe(false);
            expect(yield* acceptor.port).toEqual(Option.none());
          })
        ));
    });

    describe('Message Communication', () => {
      test('delivers connector messages to the acceptor in order', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());
            const received = yield* recordMessages(acceptor);

            for (const message of ['one', 'two', 'three']) {
              expect(yield* connector.send(message)).toBe(true);
            }

            expect(yield* received.take(3)).toEqual(['one', 'two', 'three']);
          })
        ));

      test('broadcasts acceptor messages to every peer', () =>
        run(
          Effect.gen(function* () {
            const pair = context.makeEndpointPair();
            const acceptor = yield* pair.makeAcceptor();
            const port = yield* serveEphemeral(acceptor);
            const first = yield* pair.makeConnector();
            const second = yield* pair.makeConnector();
            const firstReceived = yield* recordMessages(first);
            const secondReceived = yield* recordMessages(second);
            yield* first.connect(pair.targetFor(port));
            yield* second.connect(pair.targetFor(port));
            yield* Effect.sleep(50);

            expect(yield* acceptor.send('hello all')).toBe(true);

            expect(yield* firstReceived.take(1)).toEqual(['hello all']);
            expect(yield* secondReceived.take(1)).toEqual(['hello all']);
          })
        ));

      test('reports a send without peers as failed', () =>
        run(
          Effect.gen(function* () {
            const acceptor = yield* context.makeEndpointPair().makeAcceptor();
            yield* serveEphemeral(acceptor);

            expect(yield* acceptor.send('nobody')).toBe(false);
          })
        ));

      test('reports a send from an unconnected connector as failed', () =>
        run(
          Effect.gen(function* () {
            const connector = yield* context.makeEndpointPair().makeConnector();

            expect(yield* connector.send('nowhere')).toBe(false);
          })
        ));

      test('invokes only the callback registered last under a name', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());
            const replaced = yield* recordMessages(connector, 'listener');
            const current = yield* recordMessages(connector, 'listener');

            yield* acceptor.send('ping');

            expect(yield* current.take(1)).toEqual(['ping']);
            expect(yield* replaced.size).toBe(0);
          })
        ));

      test('stops invoking an unregistered callback', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());
            const removed = yield* recordMessages(connector, 'removed');
            const kept = yield* recordMessages(connector, 'kept');
            yield* connector.unregisterCallback('removed');
            yield* connector.unregisterCallback('never-registered');

            yield* acceptor.send('after');

            expect(yield* kept.take(1)).toEqual(['after']);
            expect(yield* removed.size).toBe(0);
          })
        ));
    });

    describe('Connection Lifecycle', () => {
      test('drops the peer when the connector stops', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());

            yield* connector.stop;

            expect(yield* acceptor.waitUntilNoPeers(DEFAULT_WAIT)).toBe(true);
            expect(yield* acceptor.peerCount).toBe(0);
            expect(yield* connector.isConnected).toBe(false);
          })
        ));

      test('disconnects the connector when the acceptor stops', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());

            yield* acceptor.stop;

            expect(yield* awaitState(connector, 'disconnected')).toEqual(
              Option.some('disconnected')
            );
            expect(yield* connector.send('late')).toBe(false);
          })
        ));

      test('treats stop as idempotent and terminal', () =>
        run(
          Effect.gen(function* () {
            const pair = context.makeEndpointPair();
            const { acceptor, connector, port } = yield* connectedPair(pair);

            yield* connector.stop;
            yield* connector.stop;
            yield* acceptor.stop;
            yield* acceptor.stop;

            expect(yield* connector.connect(pair.targetFor(port))).toBe(false);
            expect(yield* acceptor.serve({ port: 0 })).toBe(false);
          })
        ));

      test('lets a callback stop its own endpoint', () =>
        run(
          Effect.gen(function* () {
            const { acceptor, connector } = yield* connectedPair(context.makeEndpointPair());
            const stopped = yield* Deferred.make<void>();
            yield* connector.registerCallback('stopper', () =>
              pipe(connector.stop, Effect.zipRight(Deferred.succeed(stopped, undefined)))
            );

            yield* acceptor.send('stop');

            const outcome = yield* pipe(Deferred.await(stopped), Effect.timeoutOption(DEFAULT_WAIT));
            expect(Option.isSome(outcome)).toBe(true);
            expect(yield* connector.isConnected).toBe(false);
          })
        ));
    });
  });
};
