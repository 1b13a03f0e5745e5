/**
 * Dispatch engine tests. These run on live fibers and the real clock: the
 * dispatch loop is a daemon fiber and shutdown is bounded by wall time.
 */

import { describe, it, expect } from '@effect/vitest';
import { Chunk, Deferred, Duration, Effect, Option, Queue, pipe } from 'effect';
import { makeCallbackRegistry } from './callback-registry';
import { makeDispatcher } from './dispatcher';
import { silentLogger } from './logging';
import type { MessageCallback } from './shared';

const setup = (shutdownTimeout: Duration.DurationInput = Duration.seconds(1)) =>
  Effect.gen(function* () {
    const registry = yield* makeCallbackRegistry();
    const dispatcher = yield* makeDispatcher({ registry, shutdownTimeout });
    return { registry, dispatcher };
  });

const recordInto =
  (queue: Queue.Queue<string>): MessageCallback =>
  (message) =>
    Queue.offer(queue, message);

const takeAll = (queue: Queue.Queue<string>, count: number) =>
  pipe(Queue.takeN(queue, count), Effect.map(Chunk.toReadonlyArray));

describe('Dispatcher', () => {
  it.live('delivers queued messages in arrival order once started', () =>
    Effect.gen(function* () {
      const { registry, dispatcher } = yield* setup();
      const received = yield* Queue.unbounded<string>();
      yield* registry.register('record', recordInto(received));

      yield* dispatcher.enqueue('a');
      yield* dispatcher.enqueue('b');
      yield* dispatcher.enqueue('c');
      yield* dispatcher.start;

      expect(yield* takeAll(received, 3)).toEqual(['a', 'b', 'c']);
      yield* dispatcher.stop;
    })
  );

  it.live('keeps dispatching when callbacks fail or throw', () =>
    pipe(
      Effect.gen(function* () {
        const { registry, dispatcher } = yield* setup();
        const received = yield* Queue.unbounded<string>();
        yield* registry.register('fails', () => Effect.fail('boom'));
        yield* registry.register('throws', () =>
          Effect.sync(() => {
            throw new Error('thrown');
          })
        );
        yield* registry.register('record', recordInto(received));
        yield* dispatcher.start;

        yield* dispatcher.enqueue('first');
        yield* dispatcher.enqueue('second');

        expect(yield* takeAll(received, 2)).toEqual(['first', 'second']);
        expect(yield* dispatcher.isRunning).toBe(true);
        yield* dispatcher.stop;
      }),
      Effect.provide(silentLogger)
    )
  );

  it.live('lets a callback unregister itself during dispatch', () =>
    Effect.gen(function* () {
      const { registry, dispatcher } = yield* setup();
      const once = yield* Queue.unbounded<string>();
      const every = yield* Queue.unbounded<string>();
      yield* registry.register('once', (message) =>
        pipe(Queue.offer(once, message), Effect.zipRight(registry.unregister('once')))
      );
      yield* registry.register('every', recordInto(every));
      yield* dispatcher.start;

      yield* dispatcher.enqueue('m1');
      yield* dispatcher.enqueue('m2');

      expect(yield* takeAll(every, 2)).toEqual(['m1', 'm2']);
      expect(yield* takeAll(once, 1)).toEqual(['m1']);
      expect(yield* Queue.size(once)).toBe(0);
      yield* dispatcher.stop;
    })
  );

  it.live('stops idempotently and drops messages enqueued afterwards', () =>
    Effect.gen(function* () {
      const { registry, dispatcher } = yield* setup();
      const received = yield* Queue.unbounded<string>();
      yield* registry.register('record', recordInto(received));
      yield* dispatcher.start;

      yield* dispatcher.stop;
      yield* dispatcher.stop;
      yield* dispatcher.enqueue('late');
      yield* Effect.sleep(Duration.millis(50));

      expect(yield* dispatcher.isRunning).toBe(false);
      expect(yield* Queue.size(received)).toBe(0);
    })
  );

  it.live('does not restart after being stopped', () =>
    Effect.gen(function* () {
      const { dispatcher } = yield* setup();
      yield* dispatcher.stop;
      yield* dispatcher.start;

      expect(yield* dispatcher.isRunning).toBe(false);
    })
  );

  it.live('returns from a stop issued by a callback on the dispatch fiber', () =>
    Effect.gen(function* () {
      const { registry, dispatcher } = yield* setup(Duration.seconds(5));
      const stopped = yield* Deferred.make<void>();
      yield* registry.register('stopper', () =>
        pipe(dispatcher.stop, Effect.zipRight(Deferred.succeed(stopped, undefined)))
      );
      yield* dispatcher.start;
      yield* dispatcher.enqueue('stop now');

      const outcome = yield* pipe(Deferred.await(stopped), Effect.timeoutOption(Duration.seconds(2)));
      expect(Option.isSome(outcome)).toBe(true);
      expect(yield* dispatcher.isRunning).toBe(false);
    })
  );

  it.live('interrupts a callback that outlives the shutdown timeout', () =>
    pipe(
      Effect.gen(function* () {
        const { registry, dispatcher } = yield* setup(Duration.millis(50));
        const entered = yield* Deferred.make<void>();
        yield* registry.register('hangs', () =>
          pipe(Deferred.succeed(entered, undefined), Effect.zipRight(Effect.never))
        );
        yield* dispatcher.start;
        yield* dispatcher.enqueue('hang');
        yield* Deferred.await(entered);

        const stopped = yield* pipe(dispatcher.stop, Effect.timeoutOption(Duration.seconds(2)));
        expect(Option.isSome(stopped)).toBe(true);
      }),
      Effect.provide(silentLogger)
    )
  );
});
