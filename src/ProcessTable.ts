import { Context, Effect } from 'effect';
import type { ProcessTableError } from './errors.js';

export interface ProcessEntry {
  readonly pid: number;
  readonly ppid: number;
  /** Process group; a worker root spawned detached leads its own group. */
  readonly pgid: number;
  /** `ps` STAT column, e.g. `S`, `R+`, `Z`. */
  readonly state: string;
}

export interface ProcessTableInterface {
  readonly list: () => Effect.Effect<ReadonlyArray<ProcessEntry>, ProcessTableError>;

  /**
   * Sends `signal` to `pid`. Succeeds with `false` when the process does not
   * exist, so callers can treat a vanished process as already handled.
   */
  readonly signal: (
    pid: number,
    signal: NodeJS.Signals | 0
  ) => Effect.Effect<boolean, ProcessTableError>;

  /** Sends `signal` to every member of process group `pgid`; `false` when the group is empty. */
  readonly signalGroup: (
    pgid: number,
    signal: NodeJS.Signals | 0
  ) => Effect.Effect<boolean, ProcessTableError>;
}

export class ProcessTable extends Context.Tag('ProcessTable')<ProcessTable, ProcessTableInterface>() {}

export const parseProcessList = (output: string): Array<ProcessEntry> => {
  const entries: Array<ProcessEntry> = [];
  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\d+)\s+(\d+)\s+(\d+)\s+(\S+)/);
    if (!match) continue;
    entries.push({
      pid: Number.parseInt(match[1], 10),
      ppid: Number.parseInt(match[2], 10),
      pgid: Number.parseInt(match[3], 10),
      state: match[4],
    });
  }
  return entries;
};

export const isZombie = (entry: ProcessEntry): boolean => entry.state.startsWith('Z');

/** Every descendant of `rootPid`, parents before their children. */
export const collectDescendants = (
  entries: ReadonlyArray<ProcessEntry>,
  rootPid: number
): Array<number> => {
  const children = new Map<number, Array<number>>();
  for (const entry of entries) {
    if (entry.pid === entry.ppid) continue;
    const siblings = children.get(entry.ppid);
    if (siblings) {
      siblings.push(entry.pid);
    } else {
      children.set(entry.ppid, [entry.pid]);
    }
  }

  const found: Array<number> = [];
  const seen = new Set<number>([rootPid]);
  const queue = [rootPid];
  while (queue.length > 0) {
    const parent = queue.shift();
    if (parent === undefined) break;
    for (const child of children.get(parent) ?? []) {
      if (seen.has(child)) continue;
      seen.add(child);
      found.push(child);
      queue.push(child);
    }
  }
  return found;
};

/**
 * Running members of group `pgid` other than its leader. Children left behind
 * by an exited root are re-parented away from it but keep the group.
 */
export const groupMembers = (entries: ReadonlyArray<ProcessEntry>, pgid: number): Array<number> =>
  entries
    .filter((entry) => entry.pgid === pgid && entry.pid !== pgid && !isZombie(entry))
    .map((entry) => entry.pid);

/** The pids among `pids` that are still present and not zombies. */
export const stillRunning = (
  entries: ReadonlyArray<ProcessEntry>,
  pids: ReadonlyArray<number>
): Array<number> => {
  const running = new Set(entries.filter((entry) => !isZombie(entry)).map((entry) => entry.pid));
  return pids.filter((pid) => running.has(pid));
};
