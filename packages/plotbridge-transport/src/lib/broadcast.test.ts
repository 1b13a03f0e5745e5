import { describe, it, expect } from '@effect/vitest';
import { Chunk, Effect, HashMap, Queue, pipe } from 'effect';
import { broadcastToPeers } from './broadcast';
import { silentLogger } from './logging';
import { PeerId, TransportError } from './shared';

type FakePeer = { readonly label: string; readonly healthy: boolean };

const deliverTo = (received: Queue.Queue<string>) => (peer: FakePeer) =>
  peer.healthy
    ? pipe(Queue.offer(received, peer.label), Effect.asVoid)
    : Effect.fail(new TransportError({ message: `${peer.label} is gone` }));

const peersOf = (...peers: ReadonlyArray<FakePeer>) =>
  HashMap.fromIterable(peers.map((peer) => [PeerId(peer.label), peer] as const));

describe('broadcastToPeers', () => {
  it.effect('succeeds when one peer fails and another receives the message', () =>
    Effect.gen(function* () {
      const received = yield* Queue.unbounded<string>();
      const peers = peersOf({ label: 'gone', healthy: false }, { label: 'live', healthy: true });

      const sent = yield* broadcastToPeers(peers, deliverTo(received));

      expect(sent).toBe(true);
      expect(Chunk.toReadonlyArray(yield* Queue.takeAll(received))).toEqual(['live']);
    }).pipe(Effect.provide(silentLogger))
  );

  it.effect('succeeds even when every delivery fails', () =>
    Effect.gen(function* () {
      const received = yield* Queue.unbounded<string>();
      const peers = peersOf({ label: 'gone', healthy: false });

      expect(yield* broadcastToPeers(peers, deliverTo(received))).toBe(true);
      expect(yield* Queue.size(received)).toBe(0);
    }).pipe(Effect.provide(silentLogger))
  );

  it.effect('fails without peers', () =>
    pipe(
      Queue.unbounded<string>(),
      Effect.flatMap((received) => broadcastToPeers(peersOf(), deliverTo(received))),
      Effect.map((sent) => expect(sent).toBe(false))
    )
  );
});
