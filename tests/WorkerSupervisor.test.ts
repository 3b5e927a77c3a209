import { describe, it, expect } from 'vitest';
import { Duration, Effect, Fiber, Layer, Option, Ref } from 'effect';
import { OutputSink } from '../src/OutputSink.js';
import { ProcessTable, groupMembers } from '../src/ProcessTable.js';
import { ProcessTableLive } from '../src/ProcessTableLive.js';
import { makeShutdownSignal, type ShutdownSignal } from '../src/ShutdownSignal.js';
import { makeWorkerSupervisor, restartDelay, type WorkerSupervisor } from '../src/WorkerSupervisor.js';
import type { OutputRecord, WorkerSlot, WorkerSnapshot } from '../src/types.js';

const isRunning = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
};

const makeWorker = (
  shutdown: ShutdownSignal,
  command: string,
  overrides: Partial<WorkerSlot> = {}
) =>
  makeWorkerSupervisor({
    slot: {
      id: 0,
      command,
      idleTimeout: Duration.seconds(5),
      heartbeat: /b/,
      silent: false,
      ...overrides,
    },
    shutdown,
    pollInterval: Duration.millis(100),
    gracePeriod: Duration.millis(500),
    restartDelay: { initial: Duration.millis(50), max: Duration.millis(200) },
    stableAfter: Duration.seconds(10),
  });

/** Polls `worker` until `predicate` holds, failing the test after `timeout`. */
const waitFor = (
  worker: WorkerSupervisor,
  predicate: (snapshot: WorkerSnapshot) => boolean,
  timeout: Duration.DurationInput = '8 seconds'
) =>
  Effect.gen(function* () {
    while (true) {
      const snapshot = yield* worker.snapshot;
      if (predicate(snapshot)) return snapshot;
      yield* Effect.sleep('50 millis');
    }
  }).pipe(Effect.timeoutFail({ duration: timeout, onTimeout: () => new Error('condition not reached') }));

/** Root pids announced by commands that start with `echo $$`. */
const announcedPids = (records: ReadonlyArray<OutputRecord>): Array<number> =>
  records.map((record) => Number(record.line)).filter((pid) => Number.isInteger(pid) && pid > 0);

const leftInGroups = (pids: ReadonlyArray<number>) =>
  Effect.gen(function* () {
    const entries = yield* Effect.flatMap(ProcessTable, (table) => table.list());
    return pids.flatMap((pid) => groupMembers(entries, pid));
  });

/** Runs `body` with a recording sink and the real process table. */
const withRecords = <A, E>(
  body: (records: Ref.Ref<ReadonlyArray<OutputRecord>>) => Effect.Effect<A, E, OutputSink | ProcessTable>
) =>
  Effect.gen(function* () {
    const records = yield* Ref.make<ReadonlyArray<OutputRecord>>([]);
    const sink = Layer.succeed(
      OutputSink,
      OutputSink.of({ write: (record) => Ref.update(records, (current) => [...current, record]) })
    );
    return yield* body(records).pipe(Effect.provide(Layer.merge(sink, ProcessTableLive)));
  });

describe('WorkerSupervisor', () => {
  // === BACKOFF ===
  it('should back off exponentially up to the maximum', () => {
    const delay = { initial: Duration.millis(100), max: Duration.seconds(1) };

    expect(Duration.toMillis(restartDelay(0, delay))).toBe(0);
    expect(Duration.toMillis(restartDelay(1, delay))).toBe(100);
    expect(Duration.toMillis(restartDelay(3, delay))).toBe(400);
    expect(Duration.toMillis(restartDelay(5, delay))).toBe(1000);
    expect(Duration.toMillis(restartDelay(500, delay))).toBe(1000);
  });

  // === IDLE TIMEOUT ===
  it('should restart a process that stays alive but goes silent', async () => {
    const result = await Effect.runPromise(
      withRecords((records) =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, "printf 'a\\nb\\n'; sleep 100", {
            idleTimeout: Duration.seconds(1),
          });
          const fiber = yield* Effect.fork(worker.run);

          const first = yield* waitFor(worker, (s) => Option.isSome(s.pid));
          const restarted = yield* waitFor(worker, (s) => s.restarts >= 1);
          const firstPid = Option.getOrThrow(first.pid);
          const firstPidRunning = isRunning(firstPid);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);

          return { restarted, firstPidRunning, records: yield* Ref.get(records) };
        })
      )
    );

    expect(result.restarted.lastRestartReason).toEqual(Option.some('idle-timeout'));
    expect(result.firstPidRunning).toBe(false);
    expect(result.records.slice(0, 2).map((r) => [r.line, r.heartbeat])).toEqual([
      ['a', false],
      ['b', true],
    ]);
  });

  it('should not restart a process that keeps printing non-heartbeat lines', async () => {
    const snapshot = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(
            shutdown,
            'while true; do echo working; sleep 0.2; done',
            { idleTimeout: Duration.seconds(1), heartbeat: /never-printed/ }
          );
          const fiber = yield* Effect.fork(worker.run);

          yield* Effect.sleep('2500 millis');
          const snapshot = yield* worker.snapshot;

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);
          return snapshot;
        })
      )
    );

    expect(snapshot.restarts).toBe(0);
    expect(snapshot.state).toBe('running');
    expect(snapshot.liveness.records).toBeGreaterThanOrEqual(5);
    expect(snapshot.liveness.heartbeats).toBe(0);
  });

  // === EXIT ===
  it('should keep restarting a command that exits immediately', async () => {
    const snapshot = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, 'true');
          const fiber = yield* Effect.fork(worker.run);

          const snapshot = yield* waitFor(worker, (s) => s.restarts >= 4);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);
          return snapshot;
        })
      )
    );

    expect(snapshot.lastRestartReason).toEqual(Option.some('exited'));
  });

  it('should flush the last line of a process that exits without a newline', async () => {
    const records = await Effect.runPromise(
      withRecords((records) =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, "printf 'partial'");
          const fiber = yield* Effect.fork(worker.run);

          yield* waitFor(worker, (s) => s.restarts >= 1);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);
          return yield* Ref.get(records);
        })
      )
    );

    expect(records[0]?.line).toBe('partial');
  });

  // === LEFTOVER PROCESSES ===
  it('should kill background children of a root that exits before each restart', async () => {
    const result = await Effect.runPromise(
      withRecords((records) =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(
            shutdown,
            'echo $$; sleep 37.25 >/dev/null 2>&1 & sleep 0.2'
          );
          const fiber = yield* Effect.fork(worker.run);

          yield* waitFor(worker, (s) => s.restarts >= 4, '15 seconds');

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);

          const roots = announcedPids(yield* Ref.get(records));
          return { roots, left: yield* leftInGroups(roots) };
        })
      )
    );

    expect(result.roots.length).toBeGreaterThanOrEqual(4);
    expect(result.left).toEqual([]);
  });

  it('should not accumulate processes over many restart cycles', async () => {
    const result = await Effect.runPromise(
      withRecords((records) =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(
            shutdown,
            'echo $$; sleep 30 >/dev/null 2>&1 & sleep 30 >/dev/null 2>&1 &'
          );
          const fiber = yield* Effect.fork(worker.run);

          yield* waitFor(worker, (s) => s.restarts >= 8, '20 seconds');
          // every cycle but the newest one has been torn down already
          const earlier = announcedPids(yield* Ref.get(records)).slice(0, -1);
          const leftWhileRunning = yield* leftInGroups(earlier);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);

          const roots = announcedPids(yield* Ref.get(records));
          return { earlier, leftWhileRunning, leftAfterShutdown: yield* leftInGroups(roots) };
        })
      )
    );

    expect(result.earlier.length).toBeGreaterThanOrEqual(7);
    expect(result.leftWhileRunning).toEqual([]);
    expect(result.leftAfterShutdown).toEqual([]);
  });

  // === FAILURES ===
  it('should treat a spawn failure as an exit and retry', async () => {
    const snapshot = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, 'echo hello', {
            cwd: '/nonexistent/respawn-pool-test',
          });
          const fiber = yield* Effect.fork(worker.run);

          const snapshot = yield* waitFor(worker, (s) => s.restarts >= 2);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);
          return snapshot;
        })
      )
    );

    expect(snapshot.lastRestartReason).toEqual(Option.some('spawn-failed'));
    expect(Option.isNone(snapshot.pid)).toBe(true);
  });

  it('should restart a process that closes its output but keeps running', async () => {
    const snapshot = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, 'exec >&- 2>&-; sleep 30');
          const fiber = yield* Effect.fork(worker.run);

          const snapshot = yield* waitFor(worker, (s) => s.restarts >= 1);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);
          return snapshot;
        })
      )
    );

    expect(snapshot.lastRestartReason).toEqual(Option.some('stream-error'));
  });

  // === SHUTDOWN ===
  it('should stop and tear down the running process on shutdown', async () => {
    const result = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, 'sleep 30');
          const fiber = yield* Effect.fork(worker.run);

          const running = yield* waitFor(worker, (s) => s.state === 'running');
          const pid = Option.getOrThrow(running.pid);

          yield* shutdown.trigger;
          yield* Fiber.join(fiber);

          return { pid, final: yield* worker.snapshot };
        })
      )
    );

    expect(result.final.state).toBe('stopped');
    expect(result.final.restarts).toBe(0);
    expect(Option.isNone(result.final.pid)).toBe(true);
    expect(isRunning(result.pid)).toBe(false);
  });

  it('should tear down the process when the worker is interrupted', async () => {
    const pid = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const worker = yield* makeWorker(shutdown, 'sleep 30');
          const fiber = yield* Effect.fork(worker.run);

          const running = yield* waitFor(worker, (s) => s.state === 'running');
          yield* Fiber.interrupt(fiber);
          return Option.getOrThrow(running.pid);
        })
      )
    );

    expect(isRunning(pid)).toBe(false);
  });

  // === ISOLATION ===
  it('should not disturb a healthy worker while another one restarts', async () => {
    const result = await Effect.runPromise(
      withRecords(() =>
        Effect.gen(function* () {
          const shutdown = yield* makeShutdownSignal;
          const flaky = yield* makeWorker(shutdown, 'true', { id: 0 });
          const steady = yield* makeWorker(shutdown, 'sleep 30', { id: 1 });
          const fibers = [yield* Effect.fork(flaky.run), yield* Effect.fork(steady.run)];

          const before = yield* waitFor(steady, (s) => s.state === 'running');
          yield* waitFor(flaky, (s) => s.restarts >= 3);
          const after = yield* steady.snapshot;

          yield* shutdown.trigger;
          yield* Fiber.joinAll(fibers);
          return { before, after };
        })
      )
    );

    expect(result.after.restarts).toBe(0);
    expect(result.after.state).toBe('running');
    expect(result.after.pid).toEqual(result.before.pid);
    expect(result.after.liveness.lastActivityAt).toBe(result.before.liveness.lastActivityAt);
  });
});
