import type { LevelWithSilent } from 'pino';
import type { Clock, TtlPolicy } from '../time/types.js';

/**
 * Environment variables read by resolveCacheConfig.
 */
export type CacheEnv = Readonly<Record<string, string | undefined>>;

/**
 * Settings that may come from code or the environment.
 */
export interface CacheConfigOptions {
  /** Overrides TYPED_CACHE_DELETE_CORRUPTED */
  readonly deleteCorruptedEntries?: boolean | undefined;
  /** Overrides TYPED_CACHE_LOG_LEVEL */
  readonly logLevel?: LevelWithSilent | undefined;
}

/**
 * Fully resolved configuration.
 */
export interface CacheConfig {
  readonly deleteCorruptedEntries: boolean;
  readonly logLevel: LevelWithSilent;
}

/**
 * Options for createConfiguredCache.
 */
export interface ConfiguredCacheOptions extends CacheConfigOptions {
  /** Environment to read (default: process.env) */
  readonly env?: CacheEnv | undefined;
  /** Value of the logger's `service` field */
  readonly service?: string | undefined;
  readonly clock?: Clock | undefined;
  readonly ttlPolicy?: TtlPolicy | undefined;
}
