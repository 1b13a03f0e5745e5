/**
 * Connection-state waiting.
 *
 * Suspends the calling fiber until a watched value satisfies a predicate,
 * optionally bounded by a timeout, without polling.
 */

import { Duration, Effect, Option, Stream, SubscriptionRef, pipe } from 'effect';

export const awaitCondition = <A>(
  ref: SubscriptionRef.SubscriptionRef<A>,
  predicate: (value: A) => boolean,
  timeout?: Duration.DurationInput
): Effect.Effect<boolean> => {
  const firstMatch = pipe(
    ref.changes,
    Stream.filter(predicate),
    Stream.runHead,
    Effect.map(Option.isSome)
  );

  return timeout === undefined
    ? firstMatch
    : pipe(
        firstMatch,
        Effect.timeoutOption(timeout),
        Effect.map(Option.getOrElse(() => false))
      );
};
