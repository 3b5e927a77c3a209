import { Command, InvalidArgumentError } from 'commander';
import { Console, Duration, Effect, Layer } from 'effect';
import { DEFAULT_IDLE_TIMEOUT_MINUTES } from './config.js';
import { LoggingLive } from './logging.js';
import { OutputSinkLive, consoleSink, fileSink, type OutputSinkInterface } from './OutputSink.js';
import { ProcessTableLive } from './ProcessTableLive.js';
import { run } from './Supervisor.js';
import type { SupervisorOptions } from './types.js';

export interface CliArguments {
  readonly command: string;
  readonly instances: number;
  readonly pattern: string;
  readonly silent: boolean;
  readonly idleTimeoutMinutes: number;
  readonly pollIntervalMs: number;
  readonly logDir?: string;
}

interface CliOptionValues {
  readonly silent: boolean;
  readonly idleTimeout: number;
  readonly pollInterval: number;
  readonly logDir?: string;
}

const positiveNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

export const createCommand = (): Command =>
  new Command()
    .name('respawn-pool')
    .description('Keep N copies of a shell command running, restarting them when they exit or go quiet')
    .argument('<command>', 'shell command to run in each worker')
    .argument('<instances>', 'number of workers to run in parallel')
    .argument('<pattern>', 'regular expression marking a heartbeat line')
    .option('-s, --silent', 'do not echo worker output to the console', false)
    .option(
      '-t, --idle-timeout <minutes>',
      'restart a worker after this many minutes without output',
      positiveNumber,
      DEFAULT_IDLE_TIMEOUT_MINUTES
    )
    .option('--poll-interval <ms>', 'how often liveness is checked', positiveNumber, 1000)
    .option('--log-dir <dir>', 'append each worker output to <dir>/worker-<id>.log')
    .showHelpAfterError();

export const parseCliArguments = (
  argv: ReadonlyArray<string>,
  command: Command = createCommand()
): CliArguments => {
  command.parse([...argv], { from: 'user' });
  const [shellCommand, instances, pattern] = command.args;
  const options = command.opts<CliOptionValues>();

  const count = Number(instances);
  if (!Number.isInteger(count) || count < 1) {
    command.error(`error: instances must be a positive integer, got '${instances}'`);
  }

  return {
    command: shellCommand,
    instances: count,
    pattern,
    silent: options.silent,
    idleTimeoutMinutes: options.idleTimeout,
    pollIntervalMs: options.pollInterval,
    logDir: options.logDir,
  };
};

export const supervisorOptions = (args: CliArguments): SupervisorOptions => ({
  command: args.command,
  instances: args.instances,
  pattern: args.pattern,
  idleTimeout: Duration.minutes(args.idleTimeoutMinutes),
  pollInterval: Duration.millis(args.pollIntervalMs),
  silent: args.silent,
});

export const outputSinks = (args: CliArguments): Array<OutputSinkInterface> => [
  ...(args.silent ? [] : [consoleSink]),
  ...(args.logDir === undefined ? [] : [fileSink(args.logDir)]),
];

/** Runs the pool described by `argv` until SIGINT/SIGTERM; resolves to the exit code. */
export const main = async (argv: ReadonlyArray<string>): Promise<number> => {
  const args = parseCliArguments(argv);

  const program = run(supervisorOptions(args)).pipe(
    Effect.as(0),
    Effect.catchTag('InvalidConfigError', (error) => Console.error(error.message).pipe(Effect.as(1))),
    Effect.provide(Layer.merge(ProcessTableLive, OutputSinkLive(...outputSinks(args)))),
    Effect.provide(LoggingLive)
  );

  return Effect.runPromise(program).catch((error: unknown) => {
    console.error(error);
    return 1;
  });
};
