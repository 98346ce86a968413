/**
 * backend/src/modules/email-verification/policies/email-token-expiry.policy.ts
 *
 * WHY:
 * - Decides what an expired verification token takes down with it.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Expired means strictly past expiresAt.
 * - Never-verified account: the signup was never confirmed, delete the account.
 * - Verified account: it was an email change; keep the account, drop the
 *   prospective email.
 */

import type { EmailToken } from '../email-token.types';

export type ExpiredEmailTokenAction = 'DELETE_ACCOUNT' | 'DISCARD_PROSPECTIVE_EMAIL';

export function isEmailTokenExpired(token: Pick<EmailToken, 'expiresAt'>, now: Date): boolean {
  return now.getTime() > token.expiresAt.getTime();
}

export function decideExpiredEmailTokenAction(account: {
  isVerified: boolean;
}): ExpiredEmailTokenAction {
  return account.isVerified ? 'DISCARD_PROSPECTIVE_EMAIL' : 'DELETE_ACCOUNT';
}
