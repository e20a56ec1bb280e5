import type { CacheEntry } from '../entry/types.js';
import { isExpired } from '../entry/entry.js';
import type { CacheBackend } from './types.js';

/**
 * Creates an in-memory backend with a tag index.
 *
 * Values are lost when the process exits. There is no capacity limit;
 * callers that need one should bound the key space or purge regularly.
 *
 * @returns A CacheBackend instance
 *
 * @example
 * ```typescript
 * const cache = createCache(createMemoryBackend(), userCodec);
 * await cache.put('user:1', user, { ttlMs: 60_000, tags: ['user'] });
 * ```
 */
export const createMemoryBackend = (): CacheBackend => {
  const store = new Map<string, CacheEntry>();
  const tagIndex = new Map<string, Set<string>>();

  const unindex = (entry: CacheEntry): void => {
    for (const tag of entry.tags) {
      const keys = tagIndex.get(tag);
      if (keys === undefined) {
        continue;
      }
      keys.delete(entry.key);
      if (keys.size === 0) {
        tagIndex.delete(tag);
      }
    }
  };

  const removeKey = (key: string): boolean => {
    const entry = store.get(key);
    if (entry === undefined) {
      return false;
    }
    unindex(entry);
    return store.delete(key);
  };

  const read = (key: string): Promise<CacheEntry | undefined> => Promise.resolve(store.get(key));

  const readAll = (): Promise<readonly CacheEntry[]> => Promise.resolve([...store.values()]);

  const write = (entry: CacheEntry): Promise<void> => {
    // Overwrite replaces the old entry's tag associations too
    removeKey(entry.key);

    store.set(entry.key, entry);
    for (const tag of entry.tags) {
      const keys = tagIndex.get(tag) ?? new Set<string>();
      keys.add(entry.key);
      tagIndex.set(tag, keys);
    }
    return Promise.resolve();
  };

  const deleteKey = (key: string): Promise<void> => {
    removeKey(key);
    return Promise.resolve();
  };

  const clear = (): Promise<void> => {
    store.clear();
    tagIndex.clear();
    return Promise.resolve();
  };

  const keysByTag = (tag: string): Promise<ReadonlySet<string>> =>
    Promise.resolve(new Set<string>(tagIndex.get(tag)));

  const deleteTag = (tag: string): Promise<void> => {
    tagIndex.delete(tag);
    return Promise.resolve();
  };

  const purgeExpired = (nowMs: number): Promise<number> => {
    let removed = 0;
    for (const entry of [...store.values()]) {
      if (isExpired(entry, nowMs) && removeKey(entry.key)) {
        removed++;
      }
    }
    return Promise.resolve(removed);
  };

  return {
    read,
    readAll,
    write,
    delete: deleteKey,
    clear,
    keysByTag,
    deleteTag,
    purgeExpired,
  };
};
