import { Console, Context, Effect, Layer } from 'effect';
import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { OutputRecord } from './types.js';
import { SinkError } from './errors.js';

export interface OutputSinkInterface {
  readonly write: (record: OutputRecord) => Effect.Effect<void, SinkError>;
}

export class OutputSink extends Context.Tag('OutputSink')<OutputSink, OutputSinkInterface>() {}

export const consoleSink: OutputSinkInterface = {
  write: (record) => Console.log(`Worker ${record.workerId}: ${record.line}`),
};

export const noopSink: OutputSinkInterface = {
  write: () => Effect.void,
};

export const formatLogLine = (record: OutputRecord): string =>
  `${new Date(record.at).toISOString()} [worker ${record.workerId}] ${record.line}\n`;

/** Appends each record to `<directory>/worker-<id>.log`. */
export const fileSink = (directory: string): OutputSinkInterface => {
  let ready: Promise<unknown> | undefined;

  return {
    write: (record) =>
      Effect.tryPromise({
        try: async () => {
          ready ??= mkdir(directory, { recursive: true });
          await ready;
          await appendFile(join(directory, `worker-${record.workerId}.log`), formatLogLine(record));
        },
        catch: (cause) =>
          new SinkError({ message: `Failed to write log for worker ${record.workerId}`, cause }),
      }),
  };
};

export const combineSinks = (...sinks: ReadonlyArray<OutputSinkInterface>): OutputSinkInterface => ({
  write: (record) => Effect.forEach(sinks, (sink) => sink.write(record), { discard: true }),
});

export const OutputSinkLive = (...sinks: ReadonlyArray<OutputSinkInterface>): Layer.Layer<OutputSink> =>
  Layer.succeed(OutputSink, OutputSink.of(combineSinks(...sinks)));
