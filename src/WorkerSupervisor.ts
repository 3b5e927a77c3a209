import { Cause, Clock, Duration, Effect, Either, Exit, Fiber, Option, Ref } from 'effect';
import { spawnManagedProcess, type ManagedProcess, type ProcessExit } from './ManagedProcess.js';
import { initialLiveness, monitorOutput } from './OutputMonitor.js';
import { OutputSink } from './OutputSink.js';
import type { ProcessTable } from './ProcessTable.js';
import { terminateProcessTree } from './ProcessTerminator.js';
import type { ShutdownSignal } from './ShutdownSignal.js';
import type { RestartReason, WorkerSlot, WorkerSnapshot, WorkerState } from './types.js';
import { ReadError } from './errors.js';

export interface WorkerOptions {
  readonly slot: WorkerSlot;
  readonly shutdown: ShutdownSignal;
  readonly pollInterval: Duration.Duration;
  readonly gracePeriod: Duration.Duration;
  readonly restartDelay: {
    readonly initial: Duration.Duration;
    readonly max: Duration.Duration;
  };
  readonly stableAfter: Duration.Duration;
}

export interface WorkerSupervisor {
  readonly slot: WorkerSlot;
  readonly snapshot: Effect.Effect<WorkerSnapshot>;
  /** Supervises the slot until shutdown; the current process tree is always torn down on exit. */
  readonly run: Effect.Effect<void, never, OutputSink | ProcessTable>;
}

type RunOutcome =
  | { readonly _tag: 'Shutdown' }
  | { readonly _tag: 'Exited'; readonly exit: ProcessExit | undefined }
  | { readonly _tag: 'IdleTimeout'; readonly idleFor: number }
  | { readonly _tag: 'StreamError'; readonly error: ReadError };

interface CycleResult {
  readonly outcome: RunOutcome;
  readonly startedAt: number;
}

const MAX_BACKOFF_EXPONENT = 30;

/** Delay before the next spawn after `streak` restarts in a row that did not stay up. */
export const restartDelay = (
  streak: number,
  delay: WorkerOptions['restartDelay']
): Duration.Duration =>
  streak <= 0
    ? Duration.zero
    : Duration.min(
        Duration.times(delay.initial, 2 ** Math.min(streak - 1, MAX_BACKOFF_EXPONENT)),
        delay.max
      );

const reasonOf = (outcome: Exclude<RunOutcome, { _tag: 'Shutdown' }>): RestartReason => {
  switch (outcome._tag) {
    case 'Exited':
      return 'exited';
    case 'IdleTimeout':
      return 'idle-timeout';
    case 'StreamError':
      return 'stream-error';
  }
};

const describeExit = (exit: ProcessExit | undefined): string =>
  exit === undefined
    ? 'exited'
    : exit.signal !== null
      ? `was killed by ${exit.signal}`
      : `exited with code ${exit.code}`;

export const makeWorkerSupervisor = (options: WorkerOptions): Effect.Effect<WorkerSupervisor> =>
  Effect.gen(function* () {
    const { slot, shutdown, pollInterval } = options;
    const idleTimeoutMs = Duration.toMillis(slot.idleTimeout);

    const liveness = yield* Ref.make(initialLiveness(yield* Clock.currentTimeMillis));
    const status = yield* Ref.make<Omit<WorkerSnapshot, 'liveness'>>({
      id: slot.id,
      state: 'starting',
      pid: Option.none(),
      restarts: 0,
      lastRestartReason: Option.none(),
    });

    const setState = (state: WorkerState) => Ref.update(status, (current) => ({ ...current, state }));
    const detail = slot.silent ? Effect.logDebug : Effect.logInfo;

    const supervise = (proc: ManagedProcess): Effect.Effect<RunOutcome, never, OutputSink> =>
      Effect.scoped(
        Effect.gen(function* () {
          const sink = yield* OutputSink;
          const monitor = yield* Effect.forkScoped(
            monitorOutput(proc.output, {
              workerId: slot.id,
              heartbeat: slot.heartbeat,
              liveness,
              sink,
            })
          );
          let streamClosed = false;

          while (true) {
            if (yield* shutdown.isSet) {
              return { _tag: 'Shutdown' } as const;
            }

            if (!proc.isAlive()) {
              // Let trailing output drain before the pipes are abandoned.
              yield* Fiber.await(monitor).pipe(Effect.timeout(pollInterval), Effect.ignore);
              return { _tag: 'Exited', exit: proc.exitInfo() } as const;
            }

            const finished = yield* Fiber.poll(monitor);
            if (Option.isSome(finished)) {
              if (Exit.isFailure(finished.value)) {
                const cause = finished.value.cause;
                const error = Option.getOrElse(
                  Cause.failureOption(cause),
                  () =>
                    new ReadError({
                      message: `Output monitor of process ${proc.pid} died`,
                      workerId: slot.id,
                      pid: proc.pid,
                      cause: Cause.squash(cause),
                    })
                );
                return { _tag: 'StreamError', error } as const;
              }
              // Pipes close just before the exit is reported; give it one more interval.
              if (streamClosed) {
                const error = new ReadError({
                  message: `Output of process ${proc.pid} closed while it is still running`,
                  workerId: slot.id,
                  pid: proc.pid,
                });
                return { _tag: 'StreamError', error } as const;
              }
              streamClosed = true;
            }

            const now = yield* Clock.currentTimeMillis;
            const { lastActivityAt } = yield* Ref.get(liveness);
            if (now - lastActivityAt > idleTimeoutMs) {
              return { _tag: 'IdleTimeout', idleFor: now - lastActivityAt } as const;
            }

            yield* Effect.sleep(pollInterval);
          }
        })
      );

    const start = spawnManagedProcess(slot).pipe(
      Effect.tap((proc) =>
        Effect.gen(function* () {
          yield* Ref.set(liveness, initialLiveness(yield* Clock.currentTimeMillis));
          yield* Ref.update(status, (current) => ({
            ...current,
            state: 'running' as const,
            pid: Option.some(proc.pid),
          }));
          yield* detail(`Started process ${proc.pid}`);
        })
      )
    );

    const stop = (proc: ManagedProcess, exit: Exit.Exit<CycleResult>) =>
      Effect.gen(function* () {
        const stopping =
          Exit.isInterrupted(exit) || (Exit.isSuccess(exit) && exit.value.outcome._tag === 'Shutdown');
        yield* setState(stopping ? 'stopping' : 'restarting');
        if (stopping) {
          yield* Effect.logInfo('Stopping');
        }
        const result = yield* terminateProcessTree(proc, { gracePeriod: options.gracePeriod });
        yield* proc.release;
        yield* Effect.logDebug(
          `Terminated process ${proc.pid}: ${result.descendants.length} descendant(s), ` +
            `${result.forceKilled.length} force-killed`
        );
        yield* Ref.update(status, (current) => ({ ...current, pid: Option.none() }));
      });

    /** One spawn-supervise-terminate cycle. */
    const cycle = Effect.acquireUseRelease(
      start,
      (proc) =>
        Effect.map(supervise(proc), (outcome): CycleResult => ({ outcome, startedAt: proc.startedAt })),
      stop
    );

    const run = Effect.gen(function* () {
      yield* Effect.logInfo('Worker started');
      let streak = 0;

      while (!(yield* shutdown.isSet)) {
        yield* setState('starting');
        const result = yield* Effect.either(cycle);

        let reason: RestartReason;
        let uptime = 0;
        if (Either.isLeft(result)) {
          yield* Effect.logError(result.left.message, result.left.cause);
          reason = 'spawn-failed';
        } else {
          const { outcome, startedAt } = result.right;
          if (outcome._tag === 'Shutdown') {
            break;
          }
          switch (outcome._tag) {
            case 'Exited':
              yield* Effect.logInfo(`Process ${describeExit(outcome.exit)}. Restarting`);
              break;
            case 'IdleTimeout':
              yield* Effect.logWarning(
                `No output for ${Duration.format(slot.idleTimeout)}. Restarting`
              );
              break;
            case 'StreamError':
              yield* Effect.logError(`${outcome.error.message}. Restarting`, outcome.error.cause);
              break;
          }
          reason = reasonOf(outcome);
          uptime = (yield* Clock.currentTimeMillis) - startedAt;
        }

        yield* Ref.update(status, (current) => ({
          ...current,
          state: 'restarting' as const,
          restarts: current.restarts + 1,
          lastRestartReason: Option.some(reason),
        }));

        streak = uptime >= Duration.toMillis(options.stableAfter) ? 0 : streak + 1;
        const delay = restartDelay(streak, options.restartDelay);
        if (Duration.greaterThan(delay, Duration.zero)) {
          yield* Effect.logDebug(`Waiting ${Duration.format(delay)} before restarting`);
          yield* Effect.sleep(delay).pipe(Effect.raceFirst(shutdown.await));
        }
      }

      yield* setState('stopped');
      yield* Effect.logInfo('Worker stopped');
    }).pipe(Effect.annotateLogs('worker', slot.id));

    const snapshot = Effect.map(
      Effect.all([Ref.get(status), Ref.get(liveness)]),
      ([current, live]): WorkerSnapshot => ({ ...current, liveness: live })
    );

    return { slot, snapshot, run };
  });
