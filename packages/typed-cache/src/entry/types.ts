/**
 * Record persisted by a backend.
 *
 * Entries are immutable: any change is written as a full overwrite by key.
 */
export interface CacheEntry {
  /** Non-empty key, unique per backend namespace */
  readonly key: string;
  /** Identifier of the codec/schema that produced the payload */
  readonly typeId: string;
  /** Encoded value; only the codec interprets it */
  readonly payload: unknown;
  /** Write time (epoch milliseconds) */
  readonly createdAt: number;
  /** Expiry (epoch milliseconds); undefined means the entry never expires */
  readonly expiresAt?: number | undefined;
  /** Labels used for grouped invalidation */
  readonly tags: ReadonlySet<string>;
}

/**
 * Input for building a CacheEntry.
 */
export interface CacheEntryInput {
  readonly key: string;
  readonly typeId: string;
  readonly payload: unknown;
  readonly createdAt: number;
  readonly expiresAt?: number | undefined;
  readonly tags?: Iterable<string>;
}

/**
 * Fields that may differ in a modified copy of an entry.
 */
export type CacheEntryChanges = Partial<Omit<CacheEntryInput, 'key'>>;
