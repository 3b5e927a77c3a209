import { Clock, Effect, Option, Ref, Stream } from 'effect';
import { LineBuffer } from './LineBuffer.js';
import type { OutputSinkInterface } from './OutputSink.js';
import type { LivenessState, OutputChunk, OutputSource } from './types.js';
import type { ReadError } from './errors.js';

export interface MonitorOptions {
  readonly workerId: number;
  readonly heartbeat: RegExp;
  readonly liveness: Ref.Ref<LivenessState>;
  readonly sink: OutputSinkInterface;
}

export const initialLiveness = (now: number): LivenessState => ({
  lastActivityAt: now,
  lastHeartbeatAt: Option.none(),
  records: 0,
  heartbeats: 0,
});

/**
 * Splits the process output into records, hands each one to the sink and
 * refreshes the liveness state. Every record counts as activity; a heartbeat
 * match is only recorded alongside.
 *
 * Completes when both pipes have ended, after flushing unterminated output.
 */
export const monitorOutput = (
  output: Stream.Stream<OutputChunk, ReadError>,
  options: MonitorOptions
): Effect.Effect<void, ReadError> =>
  Effect.gen(function* () {
    const buffers: Record<OutputSource, LineBuffer> = {
      stdout: new LineBuffer(),
      stderr: new LineBuffer(),
    };

    const emit = (source: OutputSource, line: string) =>
      Effect.gen(function* () {
        const at = yield* Clock.currentTimeMillis;
        const heartbeat = options.heartbeat.test(line);

        yield* options.sink
          .write({ workerId: options.workerId, source, line, at, heartbeat })
          .pipe(Effect.catchAll((error) => Effect.logWarning(error.message, error.cause)));

        yield* Ref.update(options.liveness, (state) => ({
          lastActivityAt: Math.max(state.lastActivityAt, at),
          lastHeartbeatAt: heartbeat ? Option.some(at) : state.lastHeartbeatAt,
          records: state.records + 1,
          heartbeats: heartbeat ? state.heartbeats + 1 : state.heartbeats,
        }));

        if (heartbeat) {
          yield* Effect.logDebug('Heartbeat seen');
        }
      });

    const emitAll = (source: OutputSource, lines: ReadonlyArray<string>) =>
      Effect.forEach(lines, (line) => emit(source, line), { discard: true });

    yield* Stream.runForEach(output, (chunk) =>
      emitAll(chunk.source, buffers[chunk.source].push(chunk.data))
    );

    for (const source of ['stdout', 'stderr'] as const) {
      const { records, rest } = buffers[source].end();
      yield* emitAll(source, [...records, ...Option.toArray(rest)]);
    }
  }).pipe(Effect.annotateLogs('worker', options.workerId));
