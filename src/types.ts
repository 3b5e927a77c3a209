import type { Duration, Option } from 'effect';

export interface RestartDelay {
  readonly initial: Duration.DurationInput;
  readonly max: Duration.DurationInput;
}

export interface SupervisorOptions {
  readonly command: string;
  readonly instances: number;
  readonly pattern: string | RegExp;
  readonly idleTimeout: Duration.DurationInput;
  readonly silent?: boolean;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly pollInterval?: Duration.DurationInput;
  readonly gracePeriod?: Duration.DurationInput;
  readonly stagger?: Duration.DurationInput;
  readonly restartDelay?: Partial<RestartDelay>;
  readonly stableAfter?: Duration.DurationInput;
}

/** Fully resolved pool configuration, see `resolveSupervisorConfig`. */
export interface SupervisorConfig {
  readonly command: string;
  readonly instances: number;
  readonly heartbeat: RegExp;
  readonly idleTimeout: Duration.Duration;
  readonly silent: boolean;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly pollInterval: Duration.Duration;
  readonly gracePeriod: Duration.Duration;
  readonly stagger: Duration.Duration;
  readonly restartDelay: {
    readonly initial: Duration.Duration;
    readonly max: Duration.Duration;
  };
  readonly stableAfter: Duration.Duration;
}

/** Immutable per-worker configuration. */
export interface WorkerSlot {
  readonly id: number;
  readonly command: string;
  readonly idleTimeout: Duration.Duration;
  readonly heartbeat: RegExp;
  readonly silent: boolean;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
}

export type WorkerState = 'starting' | 'running' | 'restarting' | 'stopping' | 'stopped';

export type RestartReason = 'exited' | 'idle-timeout' | 'stream-error' | 'spawn-failed';

export interface LivenessState {
  readonly lastActivityAt: number;
  readonly lastHeartbeatAt: Option.Option<number>;
  readonly records: number;
  readonly heartbeats: number;
}

export interface WorkerSnapshot {
  readonly id: number;
  readonly state: WorkerState;
  readonly pid: Option.Option<number>;
  readonly restarts: number;
  readonly lastRestartReason: Option.Option<RestartReason>;
  readonly liveness: LivenessState;
}

export type OutputSource = 'stdout' | 'stderr';

export interface OutputChunk {
  readonly source: OutputSource;
  readonly data: Buffer;
}

export interface OutputRecord {
  readonly workerId: number;
  readonly source: OutputSource;
  readonly line: string;
  readonly at: number;
  readonly heartbeat: boolean;
}

export interface TerminationResult {
  readonly pid: number;
  readonly descendants: ReadonlyArray<number>;
  readonly signalled: ReadonlyArray<number>;
  readonly forceKilled: ReadonlyArray<number>;
  readonly survivors: ReadonlyArray<number>;
}
