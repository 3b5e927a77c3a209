import { Effect, Fiber, Runtime, type Scope } from 'effect';
import { resolveSupervisorConfig, workerSlots } from './config.js';
import type { OutputSink } from './OutputSink.js';
import type { ProcessTable } from './ProcessTable.js';
import { makeShutdownSignal, type ShutdownSignal } from './ShutdownSignal.js';
import { makeWorkerSupervisor } from './WorkerSupervisor.js';
import type { SupervisorConfig, SupervisorOptions, WorkerSnapshot } from './types.js';
import type { InvalidConfigError } from './errors.js';

export interface SupervisorHandle {
  readonly snapshot: Effect.Effect<ReadonlyArray<WorkerSnapshot>>;
  /** Asks every worker to stop; idempotent. */
  readonly shutdown: Effect.Effect<void>;
  /** Completes once every worker has reached `stopped`. */
  readonly awaitStopped: Effect.Effect<void>;
}

export interface StartOptions {
  /** Trigger shutdown on process signals. Defaults to true. */
  readonly handleSignals?: boolean;
  readonly signals?: ReadonlyArray<NodeJS.Signals>;
}

const DEFAULT_SIGNALS: ReadonlyArray<NodeJS.Signals> = ['SIGINT', 'SIGTERM'];

/** Installs listeners for `signals` for the lifetime of the current scope. */
export const handleTerminationSignals = (
  shutdown: ShutdownSignal,
  signals: ReadonlyArray<NodeJS.Signals> = DEFAULT_SIGNALS
): Effect.Effect<void, never, Scope.Scope> =>
  Effect.gen(function* () {
    const runFork = Runtime.runFork(yield* Effect.runtime<never>());

    const listener = (received: NodeJS.Signals) => {
      runFork(
        Effect.gen(function* () {
          if (yield* shutdown.trigger) {
            yield* Effect.logInfo(`${received} received. Stopping all workers`);
          } else {
            yield* Effect.logDebug(`${received} received, already stopping`);
          }
        })
      );
    };

    yield* Effect.acquireRelease(
      Effect.sync(() => {
        for (const signal of signals) process.on(signal, listener);
      }),
      () =>
        Effect.sync(() => {
          for (const signal of signals) process.off(signal, listener);
        })
    );
  });

/**
 * Starts one worker per slot, `config.stagger` apart, and returns at once.
 * Closing the scope interrupts the pool; each worker still tears down its
 * current process tree.
 */
export const startSupervisor = (
  config: SupervisorConfig,
  options: StartOptions = {}
): Effect.Effect<SupervisorHandle, never, OutputSink | ProcessTable | Scope.Scope> =>
  Effect.gen(function* () {
    const shutdown = yield* makeShutdownSignal;
    if (options.handleSignals ?? true) {
      yield* handleTerminationSignals(shutdown, options.signals);
    }

    const workers = yield* Effect.forEach(workerSlots(config), (slot) =>
      makeWorkerSupervisor({
        slot,
        shutdown,
        pollInterval: config.pollInterval,
        gracePeriod: config.gracePeriod,
        restartDelay: config.restartDelay,
        stableAfter: config.stableAfter,
      })
    );

    const poolLog = config.silent ? Effect.logDebug : Effect.logInfo;

    const launch = Effect.gen(function* () {
      yield* poolLog(`Starting ${config.instances} workers`);
      const fibers: Array<Fiber.RuntimeFiber<void>> = [];
      for (const [index, worker] of workers.entries()) {
        if (index > 0) {
          yield* Effect.sleep(config.stagger).pipe(Effect.raceFirst(shutdown.await));
        }
        fibers.push(yield* Effect.fork(worker.run));
      }
      yield* Fiber.joinAll(fibers);
      yield* poolLog('All workers have finished');
    });

    const pool = yield* Effect.forkScoped(launch);

    return {
      snapshot: Effect.forEach(workers, (worker) => worker.snapshot),
      shutdown: Effect.asVoid(shutdown.trigger),
      awaitStopped: Fiber.join(pool),
    };
  });

/** Runs the pool until a termination signal has drained every worker. */
export const runSupervisor = (
  config: SupervisorConfig,
  options: StartOptions = {}
): Effect.Effect<void, never, OutputSink | ProcessTable> =>
  Effect.scoped(
    Effect.flatMap(startSupervisor(config, options), (handle) => handle.awaitStopped)
  );

export const run = (
  options: SupervisorOptions
): Effect.Effect<void, InvalidConfigError, OutputSink | ProcessTable> =>
  Effect.flatMap(resolveSupervisorConfig(options), (config) => runSupervisor(config));
