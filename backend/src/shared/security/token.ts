/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Token and secret generation should be consistent and strong across the system.
 * - Raw values are safe for URLs and JSON.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()      // 32 random bytes
 * - Email tokens: send raw to user, store only the hash.
 */

import { randomBytes } from 'node:crypto';

export const SECURE_TOKEN_BYTES = 32;

export function generateSecureToken(bytes: number = SECURE_TOKEN_BYTES): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
