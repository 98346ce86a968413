/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for auth tokens.
 * - An auth token is opaque; its lifetime is the lifetime of the secret it was
 *   issued under (no separate expiry column).
 *
 * RULES:
 * - Keep aligned with DB schema.
 */

import type { Secret, SecretDto } from '../secrets';

export type StoredAuthToken = {
  token: string;
  userId: string;
  createdAt: Date;
  /** The secret that was active when the token was issued. */
  secret: Secret;
};

/** What the caller gets back: the token plus the metadata of its secret. */
export type AuthIdentification = {
  token: string;
  secret: Secret;
};

export type VerifiedAuthToken = {
  userId: string;
  identification: AuthIdentification;
};

export type AuthIdentificationDto = {
  token: string;
  secret: SecretDto;
};
