/**
 * Acceptor broadcast.
 *
 * Delivers one message to every peer concurrently. Delivery failures are
 * logged per peer and do not change the outcome: the broadcast reports
 * success whenever there was at least one peer to send to.
 */

import { Effect, HashMap, pipe } from 'effect';
import type { PeerId, TransportError } from './shared';

export const broadcastToPeers = <P>(
  peers: HashMap.HashMap<PeerId, P>,
  deliver: (peer: P) => Effect.Effect<void, TransportError>
): Effect.Effect<boolean> =>
  HashMap.isEmpty(peers)
    ? pipe(Effect.logDebug('No peer to send to'), Effect.as(false))
    : pipe(
        Effect.forEach(
          peers,
          ([id, peer]) =>
            pipe(
              deliver(peer),
              Effect.catchAll((error) =>
                pipe(
                  Effect.logWarning('Send to peer failed', error.message),
                  Effect.annotateLogs('peer', id)
                )
              )
            ),
          { concurrency: 'unbounded', discard: true }
        ),
        Effect.as(true)
      );
