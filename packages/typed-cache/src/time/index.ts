/**
 * Time sources and expiration policies.
 *
 * @packageDocumentation
 */

export type { Clock, TtlPolicy, JitteredTtlPolicyOptions } from './types.js';
export { systemClock } from './clock.js';
export { defaultTtlPolicy, createJitteredTtlPolicy } from './ttl-policy.js';
