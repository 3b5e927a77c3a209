import { Clock, Duration, Effect } from 'effect';
import type { ManagedProcess } from './ManagedProcess.js';
import { ProcessTable, collectDescendants, groupMembers, stillRunning } from './ProcessTable.js';
import type { TerminationResult } from './types.js';
import { TerminationError } from './errors.js';

export interface TerminatorOptions {
  readonly gracePeriod?: Duration.DurationInput;
  readonly checkInterval?: Duration.DurationInput;
  /** How long to wait after the final SIGKILL for the kernel to tear processes down. */
  readonly settleTimeout?: Duration.DurationInput;
}

const DEFAULT_GRACE_PERIOD = Duration.seconds(3);
const DEFAULT_CHECK_INTERVAL = Duration.millis(100);
const DEFAULT_SETTLE_TIMEOUT = Duration.seconds(1);

const union = (a: ReadonlyArray<number>, b: ReadonlyArray<number>): Array<number> => [
  ...new Set([...a, ...b]),
];

/**
 * Escalating shutdown of `proc` and every process it spawned:
 * SIGTERM to the descendants (deepest first), the root and the root's process
 * group, a grace period, SIGKILL for whatever is left, and a last signal-0
 * probe of the root and its group.
 *
 * Descendants are found both by walking parent pids and by process group, so
 * background children of a root that has already exited are still reached.
 * Never fails. A process that disappears on its own at any step counts as
 * terminated. Processes that left the group and the tree before the snapshot
 * was taken are not found.
 */
export const terminateProcessTree = (
  proc: ManagedProcess,
  options: TerminatorOptions = {}
): Effect.Effect<TerminationResult, never, ProcessTable> =>
  Effect.gen(function* () {
    const table = yield* ProcessTable;
    const rootPid = proc.pid;
    const gracePeriod = Duration.decode(options.gracePeriod ?? DEFAULT_GRACE_PERIOD);
    const checkInterval = Duration.decode(options.checkInterval ?? DEFAULT_CHECK_INTERVAL);
    const settleTimeout = Duration.decode(options.settleTimeout ?? DEFAULT_SETTLE_TIMEOUT);

    const send = (pid: number, signal: NodeJS.Signals | 0) =>
      table.signal(pid, signal).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning(error.message, error.cause).pipe(Effect.as(false))
        )
      );
    const sendGroup = (signal: NodeJS.Signals | 0) =>
      table.signalGroup(rootPid, signal).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning(error.message, error.cause).pipe(Effect.as(false))
        )
      );

    // The root is our own child: trust node's bookkeeping over a pid that may be reused.
    const remaining = (pids: ReadonlyArray<number>) =>
      Effect.gen(function* () {
        const rootAlive = pids.includes(rootPid) && proc.isAlive();
        const others = pids.filter((pid) => pid !== rootPid);
        const running = yield* table.list().pipe(
          Effect.map((entries) => union(stillRunning(entries, others), groupMembers(entries, rootPid))),
          Effect.catchAll(() =>
            Effect.filter(others, (pid) => send(pid, 0))
          )
        );
        return rootAlive ? [...running, rootPid] : running;
      });

    const waitUntilGone = (pids: ReadonlyArray<number>, timeout: Duration.Duration) =>
      Effect.gen(function* () {
        const deadline = (yield* Clock.currentTimeMillis) + Duration.toMillis(timeout);
        let alive = yield* remaining(pids);
        while (alive.length > 0 && (yield* Clock.currentTimeMillis) < deadline) {
          yield* Effect.sleep(checkInterval);
          alive = yield* remaining(alive);
        }
        return alive;
      });

    // 1. enumerate
    const snapshot = yield* table.list().pipe(
      Effect.catchAll((error) =>
        Effect.logWarning('Could not enumerate child processes', error.cause).pipe(Effect.as([]))
      )
    );
    const descendants = union(collectDescendants(snapshot, rootPid), groupMembers(snapshot, rootPid));

    // 2. graceful request, children before parents
    const signalled: Array<number> = [];
    for (const pid of [...descendants].reverse()) {
      if (yield* send(pid, 'SIGTERM')) {
        signalled.push(pid);
      }
    }
    if (proc.isAlive() && (yield* send(rootPid, 'SIGTERM'))) {
      signalled.push(rootPid);
    }
    // anything started after the snapshot
    yield* sendGroup('SIGTERM');

    // 3. grace period
    const afterGrace = yield* waitUntilGone(signalled, gracePeriod);

    // 4. force
    const forceKilled: Array<number> = [];
    for (const pid of afterGrace) {
      yield* Effect.logWarning(`Process ${pid} ignored SIGTERM, sending SIGKILL`);
      if (yield* send(pid, 'SIGKILL')) {
        forceKilled.push(pid);
      }
    }
    if (afterGrace.length > 0) {
      yield* sendGroup('SIGKILL');
    }

    // 5. verify the root and its group
    if (proc.isAlive() && (yield* send(rootPid, 0))) {
      if ((yield* send(rootPid, 'SIGKILL')) && !forceKilled.includes(rootPid)) {
        forceKilled.push(rootPid);
      }
    }
    if (yield* sendGroup(0)) {
      yield* sendGroup('SIGKILL');
    }
    yield* proc.exited.pipe(Effect.timeout(settleTimeout), Effect.ignore);

    const survivors = yield* waitUntilGone([...descendants, rootPid], settleTimeout);
    if (survivors.length > 0) {
      const error = new TerminationError({
        message: `Processes survived termination: ${survivors.join(', ')}`,
        pid: rootPid,
        survivors,
      });
      yield* Effect.logWarning(error.message);
    }

    return { pid: rootPid, descendants, signalled, forceKilled, survivors };
  }).pipe(Effect.annotateLogs({ worker: proc.workerId, pid: proc.pid }));
