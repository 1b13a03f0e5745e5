/**
 * Callback Dispatch Engine
 *
 * Decouples "a message arrived" from "a callback ran". Socket handlers only
 * enqueue; a single daemon fiber takes one message at a time, snapshots the
 * callback registry and runs every callback with it, so slow or failing
 * callbacks never stall the I/O path and messages are delivered in arrival
 * order.
 */

import { Duration, Effect, Equal, Fiber, Option, Queue, Ref, pipe } from 'effect';
import type { CallbackRegistry } from './callback-registry';
import type { MessageCallback } from './shared';

// =============================================================================
// Types
// =============================================================================

export interface DispatcherConfig {
  readonly registry: CallbackRegistry;
  readonly shutdownTimeout: Duration.DurationInput;
}

export interface Dispatcher {
  /**
   * Queues a message for dispatch. Messages arriving after `stop` are dropped.
   */
  readonly enqueue: (message: string) => Effect.Effect<void>;
  readonly start: Effect.Effect<void>;
  /**
   * Idempotent. Waits for the in-flight callback for at most the configured
   * shutdown timeout, then interrupts the dispatch fiber.
   */
  readonly stop: Effect.Effect<void>;
  readonly isRunning: Effect.Effect<boolean>;
}

interface DispatcherState {
  readonly running: boolean;
  readonly stopped: boolean;
  readonly fiber: Option.Option<Fiber.RuntimeFiber<never, never>>;
}

const initialState: DispatcherState = {
  running: false,
  stopped: false,
  fiber: Option.none(),
};

// =============================================================================
// Dispatch Loop
// =============================================================================

const invokeCallback =
  (message: string) =>
  ([name, callback]: readonly [string, MessageCallback]): Effect.Effect<void> =>
    pipe(
      Effect.suspend(() => callback(message)),
      Effect.catchAllCause((cause) =>
        pipe(
          Effect.logError('Callback execution failed', cause),
          Effect.annotateLogs('callback', name)
        )
      )
    );

const invokeWhileRunning =
  (stateRef: Ref.Ref<DispatcherState>, message: string) =>
  (entry: readonly [string, MessageCallback]): Effect.Effect<void> =>
    pipe(
      stateRef,
      Ref.get,
      Effect.flatMap((state) => (state.running ? invokeCallback(message)(entry) : Effect.void))
    );

const dispatchMessage =
  (stateRef: Ref.Ref<DispatcherState>, registry: CallbackRegistry) =>
  (message: string): Effect.Effect<void> =>
    pipe(
      registry.snapshot,
      Effect.flatMap((callbacks) =>
        Effect.forEach(callbacks, invokeWhileRunning(stateRef, message), { discard: true })
      )
    );

const dispatchLoop = (
  stateRef: Ref.Ref<DispatcherState>,
  queue: Queue.Queue<string>,
  registry: CallbackRegistry
): Effect.Effect<never> =>
  pipe(Queue.take(queue), Effect.flatMap(dispatchMessage(stateRef, registry)), Effect.forever);

// =============================================================================
// Lifecycle
// =============================================================================

const enqueueUnlessStopped =
  (stateRef: Ref.Ref<DispatcherState>, queue: Queue.Queue<string>) =>
  (message: string): Effect.Effect<void> =>
    pipe(
      stateRef,
      Ref.get,
      Effect.flatMap((state) =>
        state.stopped
          ? Effect.logDebug('Dropping message received after shutdown')
          : pipe(Queue.offer(queue, message), Effect.asVoid)
      )
    );

const recordFiber =
  (stateRef: Ref.Ref<DispatcherState>) =>
  (fiber: Fiber.RuntimeFiber<never, never>): Effect.Effect<void> =>
    Ref.update(stateRef, (state) => ({ ...state, running: true, fiber: Option.some(fiber) }));

const startDispatcher = (
  stateRef: Ref.Ref<DispatcherState>,
  queue: Queue.Queue<string>,
  registry: CallbackRegistry
): Effect.Effect<void> =>
  pipe(
    stateRef,
    Ref.get,
    Effect.flatMap((state) =>
      state.stopped || Option.isSome(state.fiber)
        ? Effect.void
        : pipe(
            // Running before the fork so the first message is never skipped.
            Ref.update(stateRef, (current) => ({ ...current, running: true })),
            Effect.zipRight(
              Effect.forkDaemon(Effect.interruptible(dispatchLoop(stateRef, queue, registry)))
            ),
            Effect.flatMap(recordFiber(stateRef))
          )
    ),
    Effect.uninterruptible
  );

const interruptAfterTimeout = (fiber: Fiber.RuntimeFiber<never, never>) =>
  pipe(
    Effect.logWarning('Dispatch fiber did not finish in time, interrupting it'),
    Effect.zipRight(Fiber.interrupt(fiber)),
    Effect.asVoid
  );

const joinOrInterrupt =
  (shutdownTimeout: Duration.DurationInput) =>
  (fiber: Fiber.RuntimeFiber<never, never>): Effect.Effect<void> =>
    Effect.fiberIdWith((current) =>
      // A callback stopping its own endpoint must not wait for itself.
      Equal.equals(current, fiber.id())
        ? Effect.void
        : pipe(
            Fiber.await(fiber),
            Effect.timeoutOption(shutdownTimeout),
            Effect.flatMap(
              Option.match({
                onNone: () => interruptAfterTimeout(fiber),
                onSome: () => Effect.void,
              })
            )
          )
    );

const markStopped = (state: DispatcherState): readonly [DispatcherState, DispatcherState] => [
  state,
  { ...state, running: false, stopped: true },
];

const stopDispatcher = (
  stateRef: Ref.Ref<DispatcherState>,
  queue: Queue.Queue<string>,
  shutdownTimeout: Duration.DurationInput
): Effect.Effect<void> =>
  pipe(
    Ref.modify(stateRef, markStopped),
    Effect.flatMap((previous) =>
      previous.stopped
        ? Effect.void
        : pipe(
            Queue.shutdown(queue),
            Effect.zipRight(
              Option.match(previous.fiber, {
                onNone: () => Effect.void,
                onSome: joinOrInterrupt(shutdownTimeout),
              })
            )
          )
    )
  );

export const makeDispatcher = (config: DispatcherConfig): Effect.Effect<Dispatcher> =>
  pipe(
    Effect.all({
      stateRef: Ref.make(initialState),
      queue: Queue.unbounded<string>(),
    }),
    Effect.map(({ stateRef, queue }) => ({
      enqueue: enqueueUnlessStopped(stateRef, queue),
      start: startDispatcher(stateRef, queue, config.registry),
      stop: stopDispatcher(stateRef, queue, config.shutdownTimeout),
      isRunning: Effect.map(Ref.get(stateRef), (state) => state.running),
    }))
  );
