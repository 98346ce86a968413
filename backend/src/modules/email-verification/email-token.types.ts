/**
 * backend/src/modules/email-verification/email-token.types.ts
 *
 * WHY:
 * - One token table serves both "verify new account" and "confirm email change".
 *   Which one applies is decided by the account state at verify time, not by a
 *   token kind column.
 */

export type EmailToken = {
  tokenHash: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
};

/** Returned once at issue time. The raw token is never stored. */
export type IssuedEmailToken = {
  token: string;
  expiresAt: Date;
};
