/**
 * Helpers shared by the endpoint contract tests and transport test suites.
 */

import { Chunk, Duration, Effect, Option, Queue, pipe } from 'effect';
import type { AcceptorEndpoint, Endpoint } from '@plotbridge/transport';

export const DEFAULT_WAIT = Duration.seconds(2);

/**
 * Serves on an ephemeral port and yields the bound port.
 */
export const serveEphemeral = (
  acceptor: AcceptorEndpoint,
  host?: string
): Effect.Effect<number, Error> =>
  pipe(
    acceptor.serve(host === undefined ? { port: 0 } : { host, port: 0 }),
    Effect.filterOrFail(
      (served) => served,
      () => new Error('Expected the acceptor to start serving')
    ),
    Effect.zipRight(acceptor.port),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(new Error('Expected a bound port')),
        onSome: Effect.succeed,
      })
    )
  );

export interface MessageRecorder {
  readonly take: (count: number, timeout?: Duration.DurationInput) => Effect.Effect<string[], Error>;
  readonly size: Effect.Effect<number>;
}

/**
 * Registers a callback under `name` that records every message it receives.
 */
export const recordMessages = (
  endpoint: Pick<Endpoint, 'registerCallback'>,
  name = 'recorder'
): Effect.Effect<MessageRecorder> =>
  pipe(
    Queue.unbounded<string>(),
    Effect.tap((queue) => endpoint.registerCallback(name, (message) => Queue.offer(queue, message))),
    Effect.map((queue) => ({
      take: (count: number, timeout: Duration.DurationInput = DEFAULT_WAIT) =>
        pipe(
          Queue.takeN(queue, count),
          Effect.map((messages) => Array.from(Chunk.toReadonlyArray(messages))),
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () => new Error(`Timed out waiting for ${count} message(s)`),
          })
        ),
      size: Queue.size(queue),
    }))
  );

export const expectTrue = (label: string) => (value: boolean): Effect.Effect<void, Error> =>
  value ? Effect.void : Effect.fail(new Error(`Expected ${label}`));
