/**
 * typed-cache - Type-safe cache orchestration over pluggable storage backends
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Cache Store
// ============================================================================

export { createCache } from './store/index.js';
export type {
  TypedCache,
  CacheOptions,
  CacheLogger,
  GetOptions,
  PutOptions,
  GetOrFetchOptions,
  Fetcher,
  TagInvalidationReport,
  TagKeyFailure,
} from './store/index.js';

// ============================================================================
// Backends
// ============================================================================

export { createMemoryBackend } from './backend/index.js';
export type { CacheBackend, MaybePromise } from './backend/index.js';

// ============================================================================
// Codecs
// ============================================================================

export { createJsonCodec, createJsonMapCodec } from './codec/index.js';
export type { Codec, JsonCodecOptions, JsonMap, JsonMapCodecOptions } from './codec/index.js';

// ============================================================================
// Entries and Time
// ============================================================================

export { createEntry, withEntryChanges, isExpired } from './entry/index.js';
export type { CacheEntry, CacheEntryInput, CacheEntryChanges } from './entry/index.js';

export { systemClock, defaultTtlPolicy, createJitteredTtlPolicy } from './time/index.js';
export type { Clock, TtlPolicy, JitteredTtlPolicyOptions } from './time/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  UnsupportedOperationError,
  classifyBackendFailure,
  createBackendError,
  createUnsupportedOperationFailure,
  createDecodeError,
  createEncodeError,
  createTypeMismatchError,
  createInvalidKeyError,
  createInvalidTtlError,
  describeCause,
  formatCacheError,
} from './errors/index.js';
export type {
  CacheError,
  CacheErrorCode,
  BackendOperation,
  BackendError,
  DecodeError,
  EncodeError,
  TypeMismatchError,
  ValidationError,
  UnsupportedOperationFailure,
} from './errors/index.js';

// ============================================================================
// Logging and Configuration
// ============================================================================

export { createLogger, toCacheLogger } from './logging/index.js';
export type { Logger, LoggingConfig } from './logging/index.js';

export { resolveCacheConfig, createConfiguredCache } from './config/index.js';
export type {
  CacheConfig,
  CacheConfigOptions,
  CacheEnv,
  ConfiguredCacheOptions,
} from './config/index.js';
