import type { Clock, JitteredTtlPolicyOptions, TtlPolicy } from './types.js';

/**
 * Default policy.
 *
 * - `undefined` or `Infinity` → never expires
 * - zero or negative → expires at `now`, so the next freshness check fails
 * - positive → `now + ttlMs`, with `ttlMs` truncated to whole milliseconds
 *   (a TTL below 1ms expires at `now`)
 */
export const defaultTtlPolicy: TtlPolicy = {
  computeExpiresAt: (ttlMs: number | undefined, clock: Clock): number | undefined => {
    if (ttlMs === undefined || ttlMs === Number.POSITIVE_INFINITY) {
      return undefined;
    }

    const now = clock.now();
    const lifespanMs = Math.trunc(ttlMs);
    if (lifespanMs <= 0) {
      return now;
    }

    return now + lifespanMs;
  },
};

/**
 * Creates a policy that spreads expirations around the requested TTL.
 *
 * Useful when many entries are written together and should not all expire
 * in the same instant. The offset is at most `jitterRatio * ttlMs` either way
 * and the result is never earlier than `now`.
 *
 * @param options - Jitter configuration
 * @returns A TtlPolicy instance
 * @throws RangeError if jitterRatio is outside [0, 1]
 *
 * @example
 * ```typescript
 * const policy = createJitteredTtlPolicy({ jitterRatio: 0.1 });
 * const cache = createCache(backend, codec, { ttlPolicy: policy });
 * await cache.put('user:1', user, { ttlMs: 60_000 }); // expires in 54s..66s
 * ```
 */
export const createJitteredTtlPolicy = (options: JitteredTtlPolicyOptions): TtlPolicy => {
  const { jitterRatio, random = Math.random } = options;

  if (!Number.isFinite(jitterRatio) || jitterRatio < 0 || jitterRatio > 1) {
    throw new RangeError('jitterRatio must be between 0 and 1');
  }

  const computeExpiresAt = (ttlMs: number | undefined, clock: Clock): number | undefined => {
    const base = defaultTtlPolicy.computeExpiresAt(ttlMs, clock);
    if (base === undefined || ttlMs === undefined) {
      return base;
    }

    const lifespanMs = Math.trunc(ttlMs);
    if (lifespanMs <= 0) {
      return base;
    }

    const now = base - lifespanMs;
    // random() in [0, 1) maps to an offset in [-spread, +spread)
    const offset = Math.round((random() * 2 - 1) * jitterRatio * lifespanMs);
    return Math.max(now, base + offset);
  };

  return { computeExpiresAt };
};
