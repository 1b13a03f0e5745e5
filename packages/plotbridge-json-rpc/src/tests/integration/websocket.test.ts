import { describe, it, expect } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import { silentLogger } from '@plotbridge/transport';
import { DEFAULT_WAIT, serveEphemeral } from '@plotbridge/testing-contracts';
import {
  makeWebSocketAcceptor,
  makeWebSocketConnector,
} from '@plotbridge/transport-websocket';
import { makeJsonRpc } from '../../lib/json-rpc';

describe('JSON-RPC over WebSocket', () => {
  it.scopedLive('calls a handler on the other side of a socket', () =>
    Effect.gen(function* () {
      const acceptor = yield* makeWebSocketAcceptor({ name: 'plot-host' });
      const port = yield* serveEphemeral(acceptor);
      const connector = yield* makeWebSocketConnector({ name: 'plot-client' });
      expect(yield* connector.connect(`ws://127.0.0.1:${port}`)).toBe(true);
      yield* acceptor.waitConnection(DEFAULT_WAIT);

      const server = yield* makeJsonRpc(acceptor);
      const client = yield* makeJsonRpc(connector);
      yield* server.registerHandler('scale', (params) =>
        Effect.succeed(Array.isArray(params) ? params.map((value) => Number(value) * 2) : null)
      );

      const result = yield* pipe(client.call('scale', [1, 2, 3]), Effect.flatMap((p) => p.result));

      expect(result).toEqual([2, 4, 6]);
    }).pipe(Effect.provide(silentLogger))
  );
});
