import { Deferred, Effect } from 'effect';

/** Set-once flag shared read-only by every worker of a pool. */
export interface ShutdownSignal {
  /** Succeeds with `true` for the call that actually set the flag. */
  readonly trigger: Effect.Effect<boolean>;
  readonly isSet: Effect.Effect<boolean>;
  readonly await: Effect.Effect<void>;
}

export const makeShutdownSignal: Effect.Effect<ShutdownSignal> = Effect.map(
  Deferred.make<void>(),
  (deferred) => ({
    trigger: Deferred.succeed(deferred, undefined),
    isSet: Deferred.isDone(deferred),
    await: Deferred.await(deferred),
  })
);
