import type { CacheEntry } from '../entry/types.js';

/**
 * A value returned either directly or through a promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Storage contract consumed by the cache store.
 *
 * Implementations (in-memory map, embedded database, remote store) are
 * injected at construction. Any operation may throw or reject; the store
 * wraps and classifies every failure. A single `write` or `delete` is
 * expected to be atomic; sequences of calls are not.
 */
export interface CacheBackend {
  /**
   * Reads one entry.
   * @param key - The entry key
   * @returns The entry, or undefined if absent
   */
  readonly read: (key: string) => MaybePromise<CacheEntry | undefined>;

  /**
   * Reads every stored entry.
   */
  readonly readAll: () => MaybePromise<readonly CacheEntry[]>;

  /**
   * Stores an entry, replacing any entry with the same key.
   */
  readonly write: (entry: CacheEntry) => MaybePromise<void>;

  /**
   * Deletes an entry. Deleting a missing key is not an error.
   */
  readonly delete: (key: string) => MaybePromise<void>;

  /**
   * Removes every entry and tag association.
   */
  readonly clear: () => MaybePromise<void>;

  /**
   * Lists the keys currently associated with a tag.
   * @returns Matching keys; an empty set when tags are unsupported
   */
  readonly keysByTag: (tag: string) => MaybePromise<ReadonlySet<string>>;

  /**
   * Drops the index entry for a tag.
   * @throws UnsupportedOperationError when the backend keeps no tag index
   */
  readonly deleteTag: (tag: string) => MaybePromise<void>;

  /**
   * Removes every entry expired at `nowMs`.
   * @param nowMs - Current time (epoch milliseconds)
   * @returns Number of entries removed
   */
  readonly purgeExpired: (nowMs: number) => MaybePromise<number>;
}
