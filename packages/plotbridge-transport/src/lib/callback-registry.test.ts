import { describe, it, expect } from '@effect/vitest';
import { Effect, HashMap, pipe } from 'effect';
import { makeCallbackRegistry } from './callback-registry';

const noop = () => Effect.void;
const other = () => Effect.void;

describe('CallbackRegistry', () => {
  it.effect('replaces a callback registered again under the same name', () =>
    Effect.gen(function* () {
      const registry = yield* makeCallbackRegistry();
      yield* registry.register('a', noop);
      yield* registry.register('a', other);

      const snapshot = yield* registry.snapshot;
      expect(HashMap.size(snapshot)).toBe(1);
      expect(HashMap.unsafeGet(snapshot, 'a')).toBe(other);
    })
  );

  it.effect('ignores unregistering a name that was never registered', () =>
    pipe(
      makeCallbackRegistry(),
      Effect.tap((registry) => registry.register('a', noop)),
      Effect.tap((registry) => registry.unregister('missing')),
      Effect.flatMap((registry) => registry.names),
      Effect.map((names) => expect(names).toEqual(['a']))
    )
  );

  it.effect('keeps a taken snapshot unchanged by later registrations', () =>
    Effect.gen(function* () {
      const registry = yield* makeCallbackRegistry();
      yield* registry.register('a', noop);
      const before = yield* registry.snapshot;

      yield* registry.register('b', noop);
      yield* registry.unregister('a');

      expect(Array.from(HashMap.keys(before))).toEqual(['a']);
      expect(yield* registry.names).toEqual(['b']);
    })
  );
});
