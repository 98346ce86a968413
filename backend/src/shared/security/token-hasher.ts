/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Email verification tokens are bearer secrets. Only their SHA-256 hash is
 *   stored, so a DB leak doesn't expose usable tokens.
 * - Lookup is by hash (primary key), which needs a deterministic function.
 *
 * HOW TO USE:
 * - issue:  raw = generateSecureToken(); store hasher.hash(raw); email raw
 * - verify: find row by hasher.hash(presented)
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
