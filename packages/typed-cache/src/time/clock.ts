import type { Clock } from './types.js';

/**
 * Clock backed by `Date.now()`.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};
