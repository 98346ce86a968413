/**
 * backend/src/shared/ids/account-id.ts
 *
 * WHY:
 * - Account ids are generated here, never supplied by clients.
 * - ULIDs sort by creation time and stay unique inside one millisecond
 *   (monotonic factory bumps the random part).
 *
 * RULES:
 * - Stored and compared lowercase (26 chars, Crockford base32).
 */

import { monotonicFactory } from 'ulid';

const nextUlid = monotonicFactory();

export const ACCOUNT_ID_LENGTH = 26;

// First char is 0-7: a 48-bit timestamp never overflows that digit.
export const ACCOUNT_ID_PATTERN = /^[0-7][0-9a-hjkmnp-tv-z]{25}$/;

export function generateAccountId(now: Date = new Date()): string {
  return nextUlid(now.getTime()).toLowerCase();
}

export function isAccountId(value: string): boolean {
  return ACCOUNT_ID_PATTERN.test(value);
}
