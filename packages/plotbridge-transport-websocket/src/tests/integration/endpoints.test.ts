/**
 * WebSocket Endpoint Integration Tests
 *
 * Runs the shared endpoint contract over real sockets on ephemeral loopback
 * ports, plus behaviors only the WebSocket transport has: close codes, binary
 * frames, invalid URLs and the handshake timeout.
 */

import { createServer, type Server, type Socket } from 'node:net';
import { describe, it, expect } from '@effect/vitest';
import { Deferred, Effect, pipe } from 'effect';
import { WebSocket } from 'ws';
import { silentLogger } from '@plotbridge/transport';
import {
  DEFAULT_WAIT,
  recordMessages,
  runEndpointContractTests,
  serveEphemeral,
  type EndpointTestContext,
} from '@plotbridge/testing-contracts';
import { makeWebSocketAcceptor } from '../../lib/websocket-acceptor';
import { makeWebSocketConnector } from '../../lib/websocket-connector';

const localUrl = (port: number): string => `ws://127.0.0.1:${port}`;

// =============================================================================
// WebSocket Test Context Implementation
// =============================================================================

const createWebSocketTestContext = (): Effect.Effect<EndpointTestContext> =>
  Effect.succeed({
    makeEndpointPair: () => ({
      makeAcceptor: () => makeWebSocketAcceptor({ name: 'test-acceptor' }),
      makeConnector: () => makeWebSocketConnector({ name: 'test-connector' }),
      targetFor: localUrl,
    }),
  });

runEndpointContractTests('WebSocket', createWebSocketTestContext);

// =============================================================================
// Raw Socket Helpers
// =============================================================================

const openRawClient = (url: string) =>
  Effect.acquireRelease(
    Effect.async<WebSocket, Error>((resume) => {
      const socket = new WebSocket(url);
      socket.once('open', () => resume(Effect.succeed(socket)));
      socket.once('error', (error) => resume(Effect.fail(error)));
    }),
    (socket) => Effect.sync(() => socket.terminate())
  );

interface CloseFrame {
  readonly code: number;
  readonly reason: string;
}

const watchClose = (socket: WebSocket) =>
  pipe(
    Deferred.make<CloseFrame>(),
    Effect.tap((closed) =>
      Effect.sync(() =>
        socket.once('close', (code: number, reason: Buffer) => {
          Effect.runSync(Deferred.succeed(closed, { code, reason: reason.toString('utf8') }));
        })
      )
    )
  );

/**
 * A TCP listener that accepts connections and never answers the handshake.
 */
const silentTcpServer = Effect.acquireRelease(
  Effect.async<{ readonly server: Server; readonly sockets: Set<Socket> }>((resume) => {
    const sockets = new Set<Socket>();
    const server = createServer((socket) => {
      sockets.add(socket);
      socket.on('close', () => sockets.delete(socket));
    });
    server.listen(0, '127.0.0.1', () => resume(Effect.succeed({ server, sockets })));
  }),
  ({ server, sockets }) =>
    Effect.async<void>((resume) => {
      sockets.forEach((socket) => socket.destroy());
      server.close(() => resume(Effect.void));
    })
);

const portOf = (server: Server): number => {
  const address = server.address();
  return address !== null && typeof address === 'object' ? address.port : 0;
};

// =============================================================================
// WebSocket-Specific Tests
// =============================================================================

describe('WebSocket endpoints', () => {
  it.scopedLive('closes peers with 1001 when the acceptor stops', () =>
    Effect.gen(function* () {
      const acceptor = yield* makeWebSocketAcceptor();
      const port = yield* serveEphemeral(acceptor);
      const client = yield* openRawClient(localUrl(port));
      const closed = yield* watchClose(client);
      yield* acceptor.waitConnection(DEFAULT_WAIT);

      yield* acceptor.stop;

      expect(yield* Deferred.await(closed)).toEqual({
        code: 1001,
        reason: 'Server shutting down',
      });
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('decodes binary frames as UTF-8 text', () =>
    Effect.gen(function* () {
      const acceptor = yield* makeWebSocketAcceptor();
      const received = yield* recordMessages(acceptor);
      const port = yield* serveEphemeral(acceptor);
      const client = yield* openRawClient(localUrl(port));

      client.send(Buffer.from('{"binary":true}', 'utf8'));

      expect(yield* received.take(1)).toEqual(['{"binary":true}']);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('delivers text frames from a plain client', () =>
    Effect.gen(function* () {
      const acceptor = yield* makeWebSocketAcceptor();
      const received = yield* recordMessages(acceptor);
      const port = yield* serveEphemeral(acceptor);
      const client = yield* openRawClient(localUrl(port));

      client.send('first');
      client.send('second');

      expect(yield* received.take(2)).toEqual(['first', 'second']);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('reports the bound port once serving', () =>
    Effect.gen(function* () {
      const acceptor = yield* makeWebSocketAcceptor();
      const port = yield* serveEphemeral(acceptor);

      expect(port).toBeGreaterThan(0);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('refuses to bind a port that is already in use', () =>
    Effect.gen(function* () {
      const first = yield* makeWebSocketAcceptor({ name: 'first' });
      const second = yield* makeWebSocketAcceptor({ name: 'second' });
      const port = yield* serveEphemeral(first);

      expect(yield* second.serve({ port })).toBe(false);
      expect(yield* second.serve({ port: 0 })).toBe(true);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('rejects a malformed URL', () =>
    Effect.gen(function* () {
      const connector = yield* makeWebSocketConnector();

      expect(yield* connector.connect('not a url')).toBe(false);
      expect(yield* connector.isConnected).toBe(false);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('gives up when the handshake exceeds the open timeout', () =>
    Effect.gen(function* () {
      const { server } = yield* silentTcpServer;
      const connector = yield* makeWebSocketConnector({ openTimeoutMs: 100 });

      expect(yield* connector.connect(localUrl(portOf(server)))).toBe(false);
      expect(yield* connector.isConnected).toBe(false);
    }).pipe(Effect.provide(silentLogger))
  );

  it.scopedLive('can connect again after the acceptor went away', () =>
    Effect.gen(function* () {
      const connector = yield* makeWebSocketConnector();
      const first = yield* makeWebSocketAcceptor({ name: 'first' });
      const firstPort = yield* serveEphemeral(first);
      expect(yield* connector.connect(localUrl(firstPort))).toBe(true);
      yield* first.stop;
      yield* Effect.sleep(100);

      const second = yield* makeWebSocketAcceptor({ name: 'second' });
      const secondPort = yield* serveEphemeral(second);

      expect(yield* connector.connect(localUrl(secondPort))).toBe(true);
      expect(yield* second.waitConnection(DEFAULT_WAIT)).toBe(true);
    }).pipe(Effect.provide(silentLogger))
  );
});
