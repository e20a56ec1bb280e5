export type {
  CacheLogger,
  CacheOptions,
  GetOptions,
  PutOptions,
  GetOrFetchOptions,
  Fetcher,
  TagKeyFailure,
  TagInvalidationReport,
  TypedCache,
} from './types.js';
export { createCache } from './cache-store.js';
