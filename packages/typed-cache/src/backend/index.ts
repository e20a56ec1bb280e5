export type { CacheBackend, MaybePromise } from './types.js';
export { createMemoryBackend } from './memory-backend.js';
