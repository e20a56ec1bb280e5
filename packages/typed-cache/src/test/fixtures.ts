/**
 * Shared test fixtures and constants.
 */

import { z } from 'zod';

// ============================================================================
// Time Constants
// ============================================================================

/** Fixed start time for fake clocks */
export const T0_MS = 1_000;

/** TTL used by most expiry tests */
export const TTL_MS = 1_000;

export const ONE_MINUTE_MS = 60 * 1000;

// ============================================================================
// Keys and Tags
// ============================================================================

export const TEST_KEY = 'test-key';
export const OTHER_KEY = 'other-key';
export const TEST_TAG = 'test-tag';

// ============================================================================
// Values
// ============================================================================

export const userSchema = z.object({
  id: z.string(),
  name: z.string(),
  roles: z.array(z.string()),
});

export type TestUser = z.infer<typeof userSchema>;

export const TEST_USER: TestUser = {
  id: 'user-1',
  name: 'Test User',
  roles: ['reader'],
};
