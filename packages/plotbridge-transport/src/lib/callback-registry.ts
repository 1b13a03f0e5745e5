/**
 * Callback Registry
 *
 * Named message callbacks, at most one per name. Registering a name again
 * replaces the previous callback. The registry is an immutable HashMap behind
 * a Ref, so a snapshot taken by the dispatcher is unaffected by callbacks
 * that register or unregister while it is being dispatched.
 */

import { Effect, HashMap, Ref, pipe } from 'effect';
import type { MessageCallback } from './shared';

export type CallbackSnapshot = HashMap.HashMap<string, MessageCallback>;

export interface CallbackRegistry {
  readonly register: (name: string, callback: MessageCallback) => Effect.Effect<void>;
  readonly unregister: (name: string) => Effect.Effect<void>;
  readonly snapshot: Effect.Effect<CallbackSnapshot>;
  readonly names: Effect.Effect<ReadonlyArray<string>>;
}

const registerIn =
  (ref: Ref.Ref<CallbackSnapshot>) =>
  (name: string, callback: MessageCallback): Effect.Effect<void> =>
    Ref.update(ref, HashMap.set(name, callback));

const unregisterIn =
  (ref: Ref.Ref<CallbackSnapshot>) =>
  (name: string): Effect.Effect<void> =>
    Ref.update(ref, HashMap.remove(name));

const namesIn = (ref: Ref.Ref<CallbackSnapshot>): Effect.Effect<ReadonlyArray<string>> =>
  pipe(
    ref,
    Ref.get,
    Effect.map((callbacks) => Array.from(HashMap.keys(callbacks)))
  );

export const makeCallbackRegistry = (): Effect.Effect<CallbackRegistry> =>
  pipe(
    Ref.make<CallbackSnapshot>(HashMap.empty()),
    Effect.map((ref) => ({
      register: registerIn(ref),
      unregister: unregisterIn(ref),
      snapshot: Ref.get(ref),
      names: namesIn(ref),
    }))
  );
