/**
 * Endpoint Core
 *
 * The machinery every endpoint role shares: the named callback registry, the
 * dispatch engine fed by the I/O side, and the log annotation that tags every
 * line with the endpoint's name. Acceptors and connectors build on it and add
 * their own connection handling.
 */

import { Duration, Effect, pipe } from 'effect';
import { makeCallbackRegistry } from './callback-registry';
import { makeDispatcher } from './dispatcher';
import type { MessageCallback } from './shared';

export const DEFAULT_DISPATCH_SHUTDOWN_TIMEOUT = Duration.seconds(1);

export interface EndpointCoreConfig {
  readonly name: string;
  readonly shutdownTimeout?: Duration.DurationInput;
}

export interface EndpointCore {
  readonly name: string;
  readonly registerCallback: (name: string, callback: MessageCallback) => Effect.Effect<void>;
  readonly unregisterCallback: (name: string) => Effect.Effect<void>;

  // I/O side: queue an inbound message for dispatch
  readonly handleMessage: (message: string) => Effect.Effect<void>;

  readonly startDispatch: Effect.Effect<void>;
  readonly stopDispatch: Effect.Effect<void>;
  readonly annotate: <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>;
}

export const makeEndpointCore = (config: EndpointCoreConfig): Effect.Effect<EndpointCore> => {
  const annotate = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, 'endpoint', config.name);

  return pipe(
    makeCallbackRegistry(),
    Effect.flatMap((registry) =>
      pipe(
        makeDispatcher({
          registry,
          shutdownTimeout: config.shutdownTimeout ?? DEFAULT_DISPATCH_SHUTDOWN_TIMEOUT,
        }),
        Effect.map((dispatcher) => ({
          name: config.name,
          registerCallback: registry.register,
          unregisterCallback: registry.unregister,
          handleMessage: dispatcher.enqueue,
          startDispatch: annotate(dispatcher.start),
          stopDispatch: annotate(dispatcher.stop),
          annotate,
        }))
      )
    )
  );
};
