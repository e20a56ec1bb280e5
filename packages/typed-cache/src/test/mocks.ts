/**
 * Mock factories for testing.
 * Provides configurable fakes for the clock, backend and codecs.
 */

import { createMemoryBackend } from '../backend/memory-backend.js';
import type { CacheBackend, MaybePromise } from '../backend/types.js';
import type { Codec } from '../codec/types.js';
import { UnsupportedOperationError } from '../errors/errors.js';
import type { BackendOperation } from '../errors/types.js';
import type { Clock } from '../time/types.js';

// ============================================================================
// Clock
// ============================================================================

/**
 * Manually driven clock.
 */
export interface FakeClock extends Clock {
  readonly advance: (ms: number) => void;
  readonly set: (ms: number) => void;
}

/**
 * Creates a clock that only moves when told to.
 */
export const createFakeClock = (initialMs: number): FakeClock => {
  let current = initialMs;

  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
};

// ============================================================================
// Backend
// ============================================================================

/**
 * Configuration for creating a faulty backend.
 */
export interface FaultyBackendConfig {
  /** Backend that handles the calls that do not fail (default: a new memory backend) */
  readonly inner?: CacheBackend;
  /** Operations that always throw */
  readonly failingOperations?: readonly BackendOperation[];
  /** Keys whose delete throws */
  readonly failingDeleteKeys?: readonly string[];
  /** Makes deleteTag throw UnsupportedOperationError */
  readonly tagIndexUnsupported?: boolean;
  /** Function to capture calls for assertions */
  readonly onCall?: (operation: BackendOperation, key?: string) => void;
}

/**
 * Creates a backend wrapper that fails selected calls and records every call.
 */
export const createFaultyBackend = (config: FaultyBackendConfig = {}): CacheBackend => {
  const {
    inner = createMemoryBackend(),
    failingOperations = [],
    failingDeleteKeys = [],
    tagIndexUnsupported = false,
    onCall,
  } = config;

  const guard = <R>(
    operation: BackendOperation,
    key: string | undefined,
    run: () => MaybePromise<R>
  ): MaybePromise<R> => {
    onCall?.(operation, key);
    if (failingOperations.includes(operation)) {
      throw new Error(`simulated ${operation} failure`);
    }
    return run();
  };

  return {
    read: (key) => guard('read', key, () => inner.read(key)),
    readAll: () => guard('readAll', undefined, () => inner.readAll()),
    write: (entry) => guard('write', entry.key, () => inner.write(entry)),
    delete: (key) =>
      guard('delete', key, () => {
        if (failingDeleteKeys.includes(key)) {
          throw new Error(`simulated delete failure for ${key}`);
        }
        return inner.delete(key);
      }),
    clear: () => guard('clear', undefined, () => inner.clear()),
    keysByTag: (tag) => guard('keysByTag', undefined, () => inner.keysByTag(tag)),
    deleteTag: (tag) =>
      guard('deleteTag', undefined, () => {
        if (tagIndexUnsupported) {
          throw new UnsupportedOperationError('deleteTag');
        }
        return inner.deleteTag(tag);
      }),
    purgeExpired: (nowMs) => guard('purgeExpired', undefined, () => inner.purgeExpired(nowMs)),
  };
};

// ============================================================================
// Codecs
// ============================================================================

/**
 * Codec storing strings as-is.
 */
export const createStringCodec = (typeId = 'string:v1'): Codec<string> => ({
  typeId,
  encode: (value) => value,
  decode: (payload) => {
    if (typeof payload !== 'string') {
      throw new TypeError('not a string');
    }
    return payload;
  },
});

/**
 * Codec storing numbers as-is.
 */
export const createNumberCodec = (typeId = 'number:v1'): Codec<number> => ({
  typeId,
  encode: (value) => value,
  decode: (payload) => {
    if (typeof payload !== 'number') {
      throw new TypeError('not a number');
    }
    return payload;
  },
});

/**
 * Configuration for creating a failing codec.
 */
export interface FailingCodecConfig {
  readonly typeId?: string;
  readonly failEncode?: boolean;
  readonly failDecode?: boolean;
}

/**
 * Creates a string codec whose encode and/or decode throw.
 */
export const createFailingCodec = (config: FailingCodecConfig = {}): Codec<string> => {
  const { typeId = 'string:v1', failEncode = false, failDecode = true } = config;
  const base = createStringCodec(typeId);

  return {
    typeId,
    encode: (value) => {
      if (failEncode) {
        throw new Error('simulated encode failure');
      }
      return base.encode(value);
    },
    decode: (payload) => {
      if (failDecode) {
        throw new Error('simulated decode failure');
      }
      return base.decode(payload);
    },
  };
};
