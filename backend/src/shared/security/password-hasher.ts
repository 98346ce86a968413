/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on this interface, never on bcrypt directly.
 * - Account creation, password change and credential checks all go through it.
 *
 * RULES:
 * - bcrypt only reads the first 72 bytes of its input. Longer passwords are
 *   rejected at the schema boundary (see passwordByteLength) instead of being
 *   silently truncated.
 */

export const MAX_PASSWORD_BYTES = 72;

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, digest: string): Promise<boolean>;
}

export function passwordByteLength(plain: string): number {
  return Buffer.byteLength(plain, 'utf8');
}
