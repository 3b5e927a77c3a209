import { Effect, Layer } from 'effect';
import { execFile } from 'node:child_process';
import { ProcessTable, parseProcessList } from './ProcessTable.js';
import { ProcessTableError } from './errors.js';

const PS_TIMEOUT_MS = 5_000;

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const kill = (target: number, signal: NodeJS.Signals | 0, label: string) =>
  Effect.try({
    try: () => {
      try {
        return process.kill(target, signal);
      } catch (error) {
        if (errnoCode(error) === 'ESRCH') {
          return false;
        }
        throw error;
      }
    },
    catch: (cause) => new ProcessTableError({ message: `Failed to send ${signal} to ${label}`, cause }),
  });

/** `ps` and `process.kill` backed process table for POSIX hosts. */
export const ProcessTableLive: Layer.Layer<ProcessTable> = Layer.succeed(
  ProcessTable,
  ProcessTable.of({
    list: () =>
      Effect.async<ReturnType<typeof parseProcessList>, ProcessTableError>((resume) => {
        execFile(
          'ps',
          ['-A', '-o', 'pid=,ppid=,pgid=,stat='],
          { encoding: 'utf8', timeout: PS_TIMEOUT_MS },
          (error, stdout) => {
            if (error) {
              resume(
                Effect.fail(
                  new ProcessTableError({ message: 'Failed to list processes with ps', cause: error })
                )
              );
              return;
            }
            resume(Effect.succeed(parseProcessList(stdout)));
          }
        );
      }),

    signal: (pid, signal) => kill(pid, signal, `process ${pid}`),
    signalGroup: (pgid, signal) => kill(-pgid, signal, `process group ${pgid}`),
  })
);
