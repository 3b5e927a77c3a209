import { Config, Duration, Effect, LogLevel, Option } from 'effect';
import type { SupervisorConfig, SupervisorOptions, WorkerSlot } from './types.js';
import { InvalidConfigError } from './errors.js';

export const DEFAULT_IDLE_TIMEOUT_MINUTES = 5;

export const defaults = {
  pollInterval: Duration.seconds(1),
  gracePeriod: Duration.seconds(3),
  stagger: Duration.seconds(1),
  restartDelay: {
    initial: Duration.millis(250),
    max: Duration.seconds(5),
  },
  stableAfter: Duration.seconds(10),
} as const;

const invalid = (field: string, message: string) =>
  Effect.fail(new InvalidConfigError({ field, message: `${field}: ${message}` }));

const positiveDuration = (field: string, input: Duration.DurationInput) =>
  Effect.suspend(() => {
    const decoded = Duration.decodeUnknown(input);
    if (Option.isNone(decoded) || !Duration.greaterThan(decoded.value, Duration.zero)) {
      return invalid(field, 'must be a positive duration');
    }
    return Effect.succeed(decoded.value);
  });

const nonNegativeDuration = (field: string, input: Duration.DurationInput) =>
  Effect.suspend(() => {
    const decoded = Duration.decodeUnknown(input);
    return Option.isNone(decoded)
      ? invalid(field, 'must be a duration')
      : Effect.succeed(decoded.value);
  });

/**
 * Heartbeat patterns are tested once per record, so the stateful `g` and `y`
 * flags are dropped.
 */
const compilePattern = (pattern: string | RegExp) =>
  Effect.try({
    try: () =>
      typeof pattern === 'string'
        ? new RegExp(pattern)
        : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
    catch: (cause) =>
      new InvalidConfigError({
        field: 'pattern',
        message: `pattern: ${cause instanceof Error ? cause.message : String(cause)}`,
      }),
  });

export const resolveSupervisorConfig = (
  options: SupervisorOptions
): Effect.Effect<SupervisorConfig, InvalidConfigError> =>
  Effect.gen(function* () {
    if (options.command.trim().length === 0) {
      return yield* invalid('command', 'must not be empty');
    }
    if (!Number.isInteger(options.instances) || options.instances < 1) {
      return yield* invalid('instances', `must be a positive integer, got ${options.instances}`);
    }

    const heartbeat = yield* compilePattern(options.pattern);
    const idleTimeout = yield* positiveDuration('idleTimeout', options.idleTimeout);
    const pollInterval = yield* positiveDuration(
      'pollInterval',
      options.pollInterval ?? defaults.pollInterval
    );
    const gracePeriod = yield* positiveDuration(
      'gracePeriod',
      options.gracePeriod ?? defaults.gracePeriod
    );
    const stagger = yield* nonNegativeDuration('stagger', options.stagger ?? defaults.stagger);
    const initial = yield* positiveDuration(
      'restartDelay.initial',
      options.restartDelay?.initial ?? defaults.restartDelay.initial
    );
    const max = yield* positiveDuration(
      'restartDelay.max',
      options.restartDelay?.max ?? defaults.restartDelay.max
    );
    if (Duration.lessThan(max, initial)) {
      return yield* invalid('restartDelay.max', 'must not be shorter than restartDelay.initial');
    }
    const stableAfter = yield* nonNegativeDuration(
      'stableAfter',
      options.stableAfter ?? defaults.stableAfter
    );

    return {
      command: options.command,
      instances: options.instances,
      heartbeat,
      idleTimeout,
      silent: options.silent ?? false,
      cwd: options.cwd,
      env: options.env,
      pollInterval,
      gracePeriod,
      stagger,
      restartDelay: { initial, max },
      stableAfter,
    };
  });

export const workerSlots = (config: SupervisorConfig): Array<WorkerSlot> =>
  Array.from({ length: config.instances }, (_, id) => ({
    id,
    command: config.command,
    idleTimeout: config.idleTimeout,
    heartbeat: config.heartbeat,
    silent: config.silent,
    cwd: config.cwd,
    env: config.env,
  }));

export type LogFormat = 'pretty' | 'logfmt' | 'json';

export interface LoggingConfig {
  readonly level: LogLevel.LogLevel;
  readonly format: LogFormat;
}

/** `LOG_LEVEL` and `LOG_FORMAT` from the environment. */
export const loggingConfig: Config.Config<LoggingConfig> = Config.all({
  level: Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info)),
  format: Config.literal('pretty', 'logfmt', 'json')('LOG_FORMAT').pipe(
    Config.withDefault('pretty' as const)
  ),
});
