/**
 * Deterministic test fixtures
 *
 * Storage tests pass these explicitly instead of relying on the clock.
 */

export const FIXED_TIMESTAMP = '2025-01-01T00:00:00.000Z';
export const FIXED_TIMESTAMP_2 = '2025-01-01T00:01:00.000Z';

export const TEST_SESSION_ID = 'test-session';
