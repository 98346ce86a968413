/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * WHY:
 * - Input tokens already carry 256 bits of randomness, so a fast unsalted
 *   digest is enough (no brute-force surface like passwords have).
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
