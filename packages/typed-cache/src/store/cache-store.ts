/**
 * Cache store orchestrating a backend, a codec and an expiration policy.
 *
 * Owns every freshness, type and recovery decision:
 * - Lazy expiration (checked on access, never on a timer)
 * - typeId validation against the configured codec
 * - Corrupted entry cleanup or reporting
 * - Best-effort maintenance (tag invalidation, purge, background refresh)
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { CacheBackend, MaybePromise } from '../backend/types.js';
import type { Codec } from '../codec/types.js';
import { createEntry, isExpired } from '../entry/entry.js';
import type { CacheEntry } from '../entry/types.js';
import {
  classifyBackendFailure,
  createDecodeError,
  createEncodeError,
  createInvalidKeyError,
  createInvalidTtlError,
  createTypeMismatchError,
} from '../errors/errors.js';
import type {
  BackendError,
  BackendOperation,
  CacheError,
  UnsupportedOperationFailure,
  ValidationError,
} from '../errors/types.js';
import { systemClock } from '../time/clock.js';
import { defaultTtlPolicy } from '../time/ttl-policy.js';
import type {
  CacheOptions,
  Fetcher,
  GetOptions,
  GetOrFetchOptions,
  PutOptions,
  TagInvalidationReport,
  TagKeyFailure,
  TypedCache,
} from './types.js';

/**
 * Creates a typed cache over a backend.
 *
 * @param backend - Storage backend
 * @param codec - Codec for every value this cache reads and writes
 * @param options - Logger, corruption policy, clock and TTL policy
 * @returns TypedCache instance
 *
 * @example
 * ```typescript
 * const users = createCache(createMemoryBackend(), userCodec, {
 *   logger: toCacheLogger(createLogger({ level: 'warn' })),
 * });
 *
 * await users.put('user:1', { id: '1', name: 'Ada' }, { ttlMs: 60_000, tags: ['user'] });
 *
 * const result = await users.getOrFetch('user:2', () => loadUser('2'), { ttlMs: 60_000 });
 * if (result.isOk()) {
 *   // Use result.value
 * }
 *
 * await users.invalidateByTag('user');
 * ```
 */
export const createCache = <T>(
  backend: CacheBackend,
  codec: Codec<T>,
  options: CacheOptions = {}
): TypedCache<T> => {
  const {
    logger,
    deleteCorruptedEntries = true,
    clock = systemClock,
    ttlPolicy = defaultTtlPolicy,
  } = options;

  const log = (message: string, error?: unknown): void => {
    if (logger === undefined) {
      return;
    }
    try {
      logger(message, error, error instanceof Error ? error.stack : undefined);
    } catch {
      // A failing sink never changes what an operation returns
    }
  };

  /**
   * Runs one backend call, turning a throw or rejection into a classified failure.
   */
  const callBackend = async <R>(
    operation: BackendOperation,
    key: string | undefined,
    run: () => MaybePromise<R>
  ): Promise<Result<R, BackendError | UnsupportedOperationFailure>> => {
    try {
      return ok(await run());
    } catch (error) {
      return err(classifyBackendFailure(operation, key, error));
    }
  };

  const validateKey = (key: string): Result<string, ValidationError> =>
    typeof key === 'string' && key.length > 0 ? ok(key) : err(createInvalidKeyError(key));

  /**
   * Cleanup delete. A failure is logged and the read still reports a miss.
   */
  const deleteQuietly = async (key: string, reason: string): Promise<void> => {
    const deleted = await callBackend('delete', key, () => backend.delete(key));
    if (deleted.isErr()) {
      log(`Failed to delete ${reason} key="${key}"`, deleted.error.cause);
    }
  };

  /**
   * Applies the expiry, type and decode policy to one stored entry.
   */
  const resolveEntry = async (
    entry: CacheEntry,
    nowMs: number,
    allowExpired: boolean
  ): Promise<Result<T | undefined, CacheError>> => {
    const { key } = entry;

    if (!allowExpired && isExpired(entry, nowMs)) {
      await deleteQuietly(key, 'expired');
      return ok(undefined);
    }

    if (entry.typeId !== codec.typeId) {
      const mismatch = createTypeMismatchError(key, entry.typeId, codec.typeId);
      if (!deleteCorruptedEntries) {
        return err(mismatch);
      }
      log(mismatch.message);
      await deleteQuietly(key, 'mismatched');
      return ok(undefined);
    }

    let value: T;
    try {
      value = codec.decode(entry.payload);
    } catch (error) {
      const decodeError = createDecodeError(key, codec.typeId, error);
      if (!deleteCorruptedEntries) {
        return err(decodeError);
      }
      log(decodeError.message, error);
      await deleteQuietly(key, 'corrupted');
      return ok(undefined);
    }

    return ok(value);
  };

  const get = async (
    key: string,
    getOptions: GetOptions = {}
  ): Promise<Result<T | undefined, CacheError>> => {
    const keyCheck = validateKey(key);
    if (keyCheck.isErr()) {
      return err(keyCheck.error);
    }

    const nowMs = clock.now();
    const read = await callBackend('read', key, () => backend.read(key));
    if (read.isErr()) {
      return err(read.error);
    }

    const entry = read.value;
    if (entry === undefined) {
      return ok(undefined);
    }

    return resolveEntry(entry, nowMs, getOptions.allowExpired ?? false);
  };

  const getAll = async (): Promise<Result<readonly T[], CacheError>> => {
    const nowMs = clock.now();
    const read = await callBackend('readAll', undefined, () => backend.readAll());
    if (read.isErr()) {
      return err(read.error);
    }

    const values: T[] = [];
    for (const entry of read.value) {
      const resolved = await resolveEntry(entry, nowMs, false);
      if (resolved.isErr()) {
        return err(resolved.error);
      }
      if (resolved.value !== undefined) {
        values.push(resolved.value);
      }
    }

    return ok(values);
  };

  const contains = async (key: string): Promise<Result<boolean, CacheError>> => {
    const keyCheck = validateKey(key);
    if (keyCheck.isErr()) {
      return err(keyCheck.error);
    }

    const read = await callBackend('read', key, () => backend.read(key));
    if (read.isErr()) {
      return err(read.error);
    }

    const entry = read.value;
    return ok(entry !== undefined && !isExpired(entry, clock.now()));
  };

  const put = async (
    key: string,
    value: T,
    putOptions: PutOptions = {}
  ): Promise<Result<void, CacheError>> => {
    const { ttlMs, tags = [] } = putOptions;

    const keyCheck = validateKey(key);
    if (keyCheck.isErr()) {
      return err(keyCheck.error);
    }
    if (ttlMs !== undefined && Number.isNaN(ttlMs)) {
      return err(createInvalidTtlError(ttlMs));
    }

    const createdAt = clock.now();
    const expiresAt = ttlPolicy.computeExpiresAt(ttlMs, clock);

    let payload: unknown;
    try {
      payload = codec.encode(value);
    } catch (error) {
      return err(createEncodeError(key, codec.typeId, error));
    }

    const entry = createEntry({ key, typeId: codec.typeId, payload, createdAt, expiresAt, tags });
    const written = await callBackend('write', key, () => backend.write(entry));
    return written.isErr() ? err(written.error) : ok(undefined);
  };

  const remove = async (key: string): Promise<Result<void, CacheError>> => {
    const keyCheck = validateKey(key);
    if (keyCheck.isErr()) {
      return err(keyCheck.error);
    }

    const deleted = await callBackend('delete', key, () => backend.delete(key));
    return deleted.isErr() ? err(deleted.error) : ok(undefined);
  };

  const invalidateByTag = async (
    tag: string
  ): Promise<Result<TagInvalidationReport, CacheError>> => {
    const lookup = await callBackend('keysByTag', undefined, () => backend.keysByTag(tag));
    if (lookup.isErr()) {
      return err(lookup.error);
    }

    const deletedKeys: string[] = [];
    const failures: TagKeyFailure[] = [];

    // Snapshot: deleting may mutate the backend's own set
    for (const key of [...lookup.value]) {
      const deleted = await callBackend('delete', key, () => backend.delete(key));
      if (deleted.isErr()) {
        log(`Failed to delete key="${key}" from tag="${tag}"`, deleted.error.cause);
        failures.push({ key, error: deleted.error });
        continue;
      }
      deletedKeys.push(key);
    }

    const dropped = await callBackend('deleteTag', undefined, () => backend.deleteTag(tag));
    if (dropped.isErr() && dropped.error.code === 'BACKEND_ERROR') {
      log(`Failed to remove index for tag="${tag}"`, dropped.error.cause);
    }

    return ok({ tag, deletedKeys, failures, tagIndexRemoved: dropped.isOk() });
  };

  const purgeExpired = async (): Promise<number> => {
    const nowMs = clock.now();
    const purged = await callBackend('purgeExpired', undefined, () => backend.purgeExpired(nowMs));
    if (purged.isErr()) {
      log('Backend purgeExpired failed', purged.error.cause);
      return 0;
    }
    return purged.value;
  };

  const clear = async (): Promise<Result<void, CacheError>> => {
    const cleared = await callBackend('clear', undefined, () => backend.clear());
    return cleared.isErr() ? err(cleared.error) : ok(undefined);
  };

  /**
   * Background refresh for stale-while-revalidate. Never rejects: every
   * failure goes to the logger.
   */
  const revalidate = async <F>(
    key: string,
    fetch: Fetcher<T, F>,
    putOptions: PutOptions
  ): Promise<void> => {
    try {
      const fetched = await fetch();
      if (fetched.isErr()) {
        log(`Background refresh failed for key="${key}"`, fetched.error);
        return;
      }

      const stored = await put(key, fetched.value, putOptions);
      if (stored.isErr()) {
        log(`Background refresh could not store key="${key}": ${stored.error.message}`, stored.error);
      }
    } catch (error) {
      log(`Background refresh failed for key="${key}"`, error);
    }
  };

  const getOrFetch = async <F>(
    key: string,
    fetch: Fetcher<T, F>,
    fetchOptions: GetOrFetchOptions = {}
  ): Promise<Result<T, CacheError | F>> => {
    const { allowExpiredWhileRevalidating = false, ...putOptions } = fetchOptions;

    const cached = await get(key, { allowExpired: allowExpiredWhileRevalidating });
    if (cached.isErr()) {
      return err(cached.error);
    }

    if (cached.value !== undefined) {
      if (allowExpiredWhileRevalidating) {
        // Detached: the caller gets the cached value whatever the refresh does
        void revalidate(key, fetch, putOptions);
      }
      return ok(cached.value);
    }

    // No single-flight: concurrent misses for one key each fetch and store
    const fetched = await fetch();
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const stored = await put(key, fetched.value, putOptions);
    if (stored.isErr()) {
      return err(stored.error);
    }

    return ok(fetched.value);
  };

  const withCodec = <U>(nextCodec: Codec<U>): TypedCache<U> =>
    createCache(backend, nextCodec, options);

  return {
    typeId: codec.typeId,
    get,
    getAll,
    contains,
    put,
    remove,
    invalidate: remove,
    invalidateByTag,
    purgeExpired,
    clear,
    getOrFetch,
    withCodec,
  };
};
