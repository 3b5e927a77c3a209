import { Effect, Stream } from 'effect';
import { spawn, type ChildProcess } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { OutputChunk, OutputSource, WorkerSlot } from './types.js';
import { ReadError, SpawnError } from './errors.js';

export interface ProcessExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

export interface ManagedProcess {
  readonly pid: number;
  readonly workerId: number;
  readonly startedAt: number;
  /** stdout and stderr, merged in arrival order. */
  readonly output: Stream.Stream<OutputChunk, ReadError>;
  /** Non-blocking: false once the child has exited and been reaped. */
  readonly isAlive: () => boolean;
  readonly exitInfo: () => ProcessExit | undefined;
  /** Resolves once the child has exited and been reaped. */
  readonly exited: Effect.Effect<ProcessExit>;
  /** Closes our ends of the output pipes, which a leftover descendant may still hold open. */
  readonly release: Effect.Effect<void>;
}

export class ManagedProcessImpl implements ManagedProcess {
  readonly output: Stream.Stream<OutputChunk, ReadError>;
  readonly exited: Effect.Effect<ProcessExit>;
  readonly release: Effect.Effect<void>;
  private exit: ProcessExit | undefined;
  private streamError: Error | undefined;

  constructor(
    public readonly workerId: number,
    public readonly pid: number,
    public readonly startedAt: number,
    private readonly childProcess: ChildProcess
  ) {
    this.childProcess.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exit = { code, signal };
    });

    this.output = Stream.merge(
      this.createReadableStream('stdout', this.childProcess.stdout),
      this.createReadableStream('stderr', this.childProcess.stderr)
    );

    this.exited = Effect.async<ProcessExit>((resume) => {
      if (this.exit) {
        resume(Effect.succeed(this.exit));
        return;
      }
      const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
        resume(Effect.succeed({ code, signal }));
      };
      this.childProcess.once('exit', onExit);
      return Effect.sync(() => {
        this.childProcess.off('exit', onExit);
      });
    });

    this.release = Effect.sync(() => {
      this.childProcess.stdout?.destroy();
      this.childProcess.stderr?.destroy();
    });
  }

  private createReadableStream(
    source: OutputSource,
    readable: Readable | null
  ): Stream.Stream<OutputChunk, ReadError> {
    /* v8 ignore next 3 - unreachable with stdio: ['ignore', 'pipe', 'pipe'] */
    if (!readable) {
      return Stream.empty;
    }

    // Keeps an error raised between subscriptions from crashing the process.
    readable.on('error', (err: Error) => {
      this.streamError = err;
    });

    const self = this;
    return Stream.asyncScoped<OutputChunk, ReadError>((emit) =>
      Effect.gen(function* () {
        const fail = (err: Error) =>
          void emit.fail(
            new ReadError({
              message: `Error reading ${source} of process ${self.pid}`,
              workerId: self.workerId,
              pid: self.pid,
              cause: err,
            })
          );

        if (self.streamError) {
          fail(self.streamError);
          return;
        }

        const onData = (data: Buffer) => {
          void emit.single({ source, data });
        };
        const onEnd = () => {
          void emit.end();
        };

        readable.on('data', onData);
        readable.on('end', onEnd);
        readable.on('error', fail);

        if (readable.readableEnded) {
          onEnd();
        }

        yield* Effect.addFinalizer(() =>
          Effect.sync(() => {
            readable.off('data', onData);
            readable.off('end', onEnd);
            readable.off('error', fail);
          })
        );
      })
    );
  }

  isAlive(): boolean {
    return this.exit === undefined;
  }

  exitInfo(): ProcessExit | undefined {
    return this.exit;
  }
}

/**
 * Starts `slot.command` through the shell in its own process group, so that
 * a Ctrl+C on the supervisor's terminal reaches the supervisor only and the
 * tree is torn down by the terminator.
 */
export const spawnManagedProcess = (slot: WorkerSlot): Effect.Effect<ManagedProcess, SpawnError> =>
  Effect.async<ManagedProcess, SpawnError>((resume) => {
    const spawnError = (cause: unknown) =>
      new SpawnError({
        message: `Worker ${slot.id}: failed to start "${slot.command}"`,
        workerId: slot.id,
        command: slot.command,
        cause,
      });

    let child: ChildProcess;
    try {
      child = spawn(slot.command, {
        shell: true,
        detached: true,
        cwd: slot.cwd,
        env: slot.env ? { ...globalThis.process.env, ...slot.env } : undefined,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (cause) {
      resume(Effect.fail(spawnError(cause)));
      return;
    }

    const onSpawn = () => {
      child.off('error', onError);
      const pid = child.pid;
      /* v8 ignore next 4 - node always assigns a pid before 'spawn' */
      if (pid === undefined) {
        resume(Effect.fail(spawnError(new Error('no pid assigned'))));
        return;
      }
      resume(Effect.succeed(new ManagedProcessImpl(slot.id, pid, Date.now(), child)));
    };
    const onError = (err: Error) => {
      child.off('spawn', onSpawn);
      resume(Effect.fail(spawnError(err)));
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
