import type { CacheEntry, CacheEntryChanges, CacheEntryInput } from './types.js';

/**
 * Builds an immutable cache entry.
 *
 * The tag collection is copied so later changes by the caller do not leak
 * into a stored entry.
 *
 * @param input - Entry fields
 * @returns A new CacheEntry
 */
export const createEntry = (input: CacheEntryInput): CacheEntry => ({
  key: input.key,
  typeId: input.typeId,
  payload: input.payload,
  createdAt: input.createdAt,
  expiresAt: input.expiresAt,
  tags: new Set(input.tags ?? []),
});

/**
 * Returns a copy of an entry with some fields replaced. The key never changes.
 */
export const withEntryChanges = (entry: CacheEntry, changes: CacheEntryChanges): CacheEntry =>
  createEntry({
    key: entry.key,
    typeId: changes.typeId ?? entry.typeId,
    payload: 'payload' in changes ? changes.payload : entry.payload,
    createdAt: changes.createdAt ?? entry.createdAt,
    expiresAt: 'expiresAt' in changes ? changes.expiresAt : entry.expiresAt,
    tags: changes.tags ?? entry.tags,
  });

/**
 * Checks whether an entry has expired.
 *
 * An entry is expired exactly at its expiry instant, not after it.
 *
 * @param entry - The entry to check
 * @param nowMs - Current time (epoch milliseconds)
 * @returns true if the entry has an expiry and `nowMs` has reached it
 */
export const isExpired = (entry: Pick<CacheEntry, 'expiresAt'>, nowMs: number): boolean =>
  entry.expiresAt !== undefined && nowMs >= entry.expiresAt;
