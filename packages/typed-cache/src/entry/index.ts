export type { CacheEntry, CacheEntryInput, CacheEntryChanges } from './types.js';
export { createEntry, withEntryChanges, isExpired } from './entry.js';
