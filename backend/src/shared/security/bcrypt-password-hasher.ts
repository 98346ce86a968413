/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - Tests use a low cost (4) so hashing doesn't dominate runtime.
 */

import bcrypt from 'bcrypt';
import { MAX_PASSWORD_BYTES, passwordByteLength } from './password-hasher';
import type { PasswordHasher } from './password-hasher';

const MIN_COST = 4;
const MAX_COST = 15;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    const cost = opts?.cost ?? 12;
    if (!Number.isInteger(cost) || cost < MIN_COST || cost > MAX_COST) {
      throw new Error(`bcrypt cost must be an integer in [${MIN_COST}, ${MAX_COST}]`);
    }
    this.cost = cost;
  }

  async hash(plain: string): Promise<string> {
    if (passwordByteLength(plain) > MAX_PASSWORD_BYTES) {
      throw new Error(`password exceeds ${MAX_PASSWORD_BYTES} bytes`);
    }
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, digest: string): Promise<boolean> {
    // A longer input would compare only its 72-byte prefix.
    if (passwordByteLength(plain) > MAX_PASSWORD_BYTES) return false;
    return bcrypt.compare(plain, digest);
  }
}
