export type { CacheEnv, CacheConfig, CacheConfigOptions, ConfiguredCacheOptions } from './types.js';
export { resolveCacheConfig } from './config.js';
export { createConfiguredCache } from './configured-cache.js';
