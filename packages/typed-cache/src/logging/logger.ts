import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { CacheLogger } from '../store/types.js';
import type { LoggingConfig } from './types.js';

export type { Logger } from 'pino';

const DEFAULT_SERVICE = 'typed-cache';

/**
 * Creates a pino logger with JSON output and a `service` base field.
 *
 * @param config - Level and service name
 * @param destination - Where lines are written (default: stdout)
 * @returns A pino Logger
 */
export const createLogger = (config: LoggingConfig = {}, destination?: DestinationStream): Logger => {
  const options: LoggerOptions = {
    level: config.level ?? 'info',
    base: { service: config.service ?? DEFAULT_SERVICE },
  };

  return destination === undefined ? pino(options) : pino(options, destination);
};

/**
 * Adapts a pino logger into the cache's failure sink.
 *
 * Every recoverable failure is written at `warn`, with the error under `err`
 * and its stack, when known, under `trace`.
 *
 * @example
 * ```typescript
 * const cache = createCache(backend, codec, { logger: toCacheLogger(createLogger()) });
 * ```
 */
export const toCacheLogger =
  (logger: Logger): CacheLogger =>
  (message, error, trace) => {
    if (error === undefined) {
      logger.warn(message);
      return;
    }
    logger.warn({ err: error, trace }, message);
  };
