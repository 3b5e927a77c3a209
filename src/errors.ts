import { Data } from 'effect';

export class SpawnError extends Data.TaggedError('SpawnError')<{
  readonly message: string;
  readonly workerId: number;
  readonly command: string;
  readonly cause?: unknown;
}> {}

export class ReadError extends Data.TaggedError('ReadError')<{
  readonly message: string;
  readonly workerId: number;
  readonly pid: number;
  readonly cause?: unknown;
}> {}

export class TerminationError extends Data.TaggedError('TerminationError')<{
  readonly message: string;
  readonly pid: number;
  readonly survivors: ReadonlyArray<number>;
}> {}

export class ProcessTableError extends Data.TaggedError('ProcessTableError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SinkError extends Data.TaggedError('SinkError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class InvalidConfigError extends Data.TaggedError('InvalidConfigError')<{
  readonly message: string;
  readonly field: string;
}> {}
