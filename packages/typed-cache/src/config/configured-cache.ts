import type { CacheBackend } from '../backend/types.js';
import type { Codec } from '../codec/types.js';
import { createLogger, toCacheLogger } from '../logging/logger.js';
import { createCache } from '../store/cache-store.js';
import type { TypedCache } from '../store/types.js';
import { resolveCacheConfig } from './config.js';
import type { ConfiguredCacheOptions } from './types.js';

/**
 * Creates a cache whose corruption policy and pino logger come from
 * resolveCacheConfig.
 *
 * @example
 * ```typescript
 * // TYPED_CACHE_LOG_LEVEL=warn TYPED_CACHE_DELETE_CORRUPTED=false
 * const sessions = createConfiguredCache(createMemoryBackend(), sessionCodec);
 * ```
 */
export const createConfiguredCache = <T>(
  backend: CacheBackend,
  codec: Codec<T>,
  options: ConfiguredCacheOptions = {}
): TypedCache<T> => {
  const { env, service, clock, ttlPolicy, ...settings } = options;
  const config = resolveCacheConfig(settings, env);
  const logger = createLogger({ level: config.logLevel, service });

  return createCache(backend, codec, {
    logger: toCacheLogger(logger),
    deleteCorruptedEntries: config.deleteCorruptedEntries,
    clock,
    ttlPolicy,
  });
};
