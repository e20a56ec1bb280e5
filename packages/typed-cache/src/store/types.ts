import type { Result } from 'neverthrow';
import type { Codec } from '../codec/types.js';
import type {
  BackendError,
  CacheError,
  UnsupportedOperationFailure,
} from '../errors/types.js';
import type { Clock, TtlPolicy } from '../time/types.js';

/**
 * Sink for recoverable failures. Purely observational: it never changes
 * what an operation returns.
 *
 * @param message - What failed
 * @param error - The underlying error, if any
 * @param trace - Stack trace of the underlying error, if available
 */
export type CacheLogger = (message: string, error?: unknown, trace?: string) => void;

/**
 * Options for createCache.
 */
export interface CacheOptions {
  /** Receives every recoverable failure (default: none) */
  readonly logger?: CacheLogger | undefined;
  /**
   * Delete type-mismatched or undecodable entries and report a miss.
   * When false, such reads fail with TYPE_MISMATCH or DECODE_ERROR.
   * @default true
   */
  readonly deleteCorruptedEntries?: boolean | undefined;
  /** Time source (default: systemClock) */
  readonly clock?: Clock | undefined;
  /** Expiration policy (default: defaultTtlPolicy) */
  readonly ttlPolicy?: TtlPolicy | undefined;
}

/**
 * Options for get.
 */
export interface GetOptions {
  /** Return expired entries instead of deleting them */
  readonly allowExpired?: boolean | undefined;
}

/**
 * Options for put.
 */
export interface PutOptions {
  /** Lifespan in milliseconds; undefined means the entry never expires */
  readonly ttlMs?: number | undefined;
  /** Labels for grouped invalidation */
  readonly tags?: Iterable<string> | undefined;
}

/**
 * Options for getOrFetch.
 */
export interface GetOrFetchOptions extends PutOptions {
  /**
   * Serve an expired value immediately and refresh it in the background.
   * @default false
   */
  readonly allowExpiredWhileRevalidating?: boolean | undefined;
}

/**
 * Loads a value on a cache miss.
 */
export type Fetcher<T, F> = () => Promise<Result<T, F>>;

/**
 * A key that could not be deleted during tag invalidation.
 */
export interface TagKeyFailure {
  readonly key: string;
  readonly error: BackendError | UnsupportedOperationFailure;
}

/**
 * Outcome of a best-effort tag invalidation.
 */
export interface TagInvalidationReport {
  readonly tag: string;
  /** Keys deleted successfully */
  readonly deletedKeys: readonly string[];
  /** Keys whose delete failed; the remaining keys were still processed */
  readonly failures: readonly TagKeyFailure[];
  /** Whether the backend dropped its index entry for the tag */
  readonly tagIndexRemoved: boolean;
}

/**
 * Type-safe cache over a pluggable backend.
 */
export interface TypedCache<T> {
  /** typeId of the codec this cache reads and writes */
  readonly typeId: string;

  /**
   * Reads a value.
   * @param key - Non-empty key
   * @param options - Read options
   * @returns The value, or undefined on a miss (absent, expired, or cleaned-up corrupted entry)
   */
  readonly get: (key: string, options?: GetOptions) => Promise<Result<T | undefined, CacheError>>;

  /**
   * Reads every entry, returning the values that pass expiry, type and decode checks.
   */
  readonly getAll: () => Promise<Result<readonly T[], CacheError>>;

  /**
   * Checks for a non-expired entry without decoding it.
   */
  readonly contains: (key: string) => Promise<Result<boolean, CacheError>>;

  /**
   * Writes a value, replacing any existing entry for the key.
   */
  readonly put: (key: string, value: T, options?: PutOptions) => Promise<Result<void, CacheError>>;

  /**
   * Deletes an entry.
   */
  readonly remove: (key: string) => Promise<Result<void, CacheError>>;

  /**
   * Deletes an entry. Same operation as remove.
   */
  readonly invalidate: (key: string) => Promise<Result<void, CacheError>>;

  /**
   * Deletes every entry carrying a tag, continuing past individual failures.
   * @returns A report of deleted keys and per-key failures; fails only when the tag lookup fails
   */
  readonly invalidateByTag: (tag: string) => Promise<Result<TagInvalidationReport, CacheError>>;

  /**
   * Asks the backend to remove expired entries.
   * @returns Number removed; 0 when the backend fails
   */
  readonly purgeExpired: () => Promise<number>;

  /**
   * Removes every entry.
   */
  readonly clear: () => Promise<Result<void, CacheError>>;

  /**
   * Cache-aside read with optional stale-while-revalidate.
   *
   * On a miss, `fetch` runs and its value is stored and returned; an error
   * result from `fetch` is returned unchanged. With
   * `allowExpiredWhileRevalidating`, a cached value (even an expired one) is
   * returned at once while a detached refresh runs; refresh failures are
   * only logged.
   */
  readonly getOrFetch: <F>(
    key: string,
    fetch: Fetcher<T, F>,
    options?: GetOrFetchOptions
  ) => Promise<Result<T, CacheError | F>>;

  /**
   * Creates a cache for another value type over the same backend and options.
   */
  readonly withCodec: <U>(codec: Codec<U>) => TypedCache<U>;
}
