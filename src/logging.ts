import { Effect, Layer, Logger } from 'effect';
import type { ConfigError } from 'effect/ConfigError';
import { loggingConfig, type LogFormat, type LoggingConfig } from './config.js';

const formatLayer = (format: LogFormat): Layer.Layer<never> => {
  switch (format) {
    case 'json':
      return Logger.json;
    case 'logfmt':
      return Logger.logFmt;
    case 'pretty':
      return Logger.pretty;
  }
};

export const loggerLayer = (config: LoggingConfig): Layer.Layer<never> =>
  Layer.merge(formatLayer(config.format), Logger.minimumLogLevel(config.level));

/** Logger chosen by `LOG_FORMAT`, filtered by `LOG_LEVEL`. */
export const LoggingLive: Layer.Layer<never, ConfigError> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* loggingConfig;
    return loggerLayer(config);
  })
);
