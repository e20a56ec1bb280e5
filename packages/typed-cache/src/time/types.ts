/**
 * Time source used for every freshness decision.
 */
export interface Clock {
  /**
   * Returns the current instant.
   * @returns Integer millisecond timestamp
   */
  readonly now: () => number;
}

/**
 * Strategy for turning a requested time-to-live into an absolute expiry.
 *
 * Alternate policies (jittered, sliding) must keep the same return contract
 * so the store never special-cases them.
 */
export interface TtlPolicy {
  /**
   * Computes the expiry instant for an entry written now.
   * @param ttlMs - Requested lifespan in milliseconds, or undefined for no expiry
   * @param clock - Time source
   * @returns Absolute millisecond timestamp, or undefined when the entry never expires
   */
  readonly computeExpiresAt: (ttlMs: number | undefined, clock: Clock) => number | undefined;
}

/**
 * Options for the jittered TTL policy.
 */
export interface JitteredTtlPolicyOptions {
  /** Maximum spread as a fraction of the TTL, between 0 and 1 */
  readonly jitterRatio: number;
  /** Random source returning values in [0, 1) (default: Math.random) */
  readonly random?: () => number;
}
