/**
 * backend/src/modules/secrets/secret.types.ts
 *
 * WHY:
 * - Domain type for signing secrets.
 * - A Secret is immutable: rotation creates a new one, it never edits the old one.
 */

export type Secret = {
  /** 32 random bytes, base64url. */
  key: string;
  createdAt: Date;
  /** Always a Monday 03:00 UTC, strictly after createdAt. */
  expiresAt: Date;
};

export type SecretDto = {
  key: string;
  createdAt: string;
  expiresAt: string;
};

export function toSecretDto(secret: Secret): SecretDto {
  return {
    key: secret.key,
    createdAt: secret.createdAt.toISOString(),
    expiresAt: secret.expiresAt.toISOString(),
  };
}

export function isSecretLive(secret: Secret, now: Date): boolean {
  return secret.expiresAt.getTime() > now.getTime();
}
