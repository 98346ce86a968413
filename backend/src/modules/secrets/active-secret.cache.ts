/**
 * backend/src/modules/secrets/active-secret.cache.ts
 *
 * WHY:
 * - Token issuance and verification ask for the active secret on every call.
 *   The process keeps it in memory until it expires or is rotated.
 *
 * RULES:
 * - Process-local and lost on restart; the DB `active_secret` row stays the
 *   source of truth and is re-read on a miss.
 * - An expired entry is never returned.
 * - One instance per app, created in di.ts.
 */

import type { Secret } from './secret.types';
import { isSecretLive } from './secret.types';

export class ActiveSecretCache {
  private secret: Secret | null = null;

  get(now: Date): Secret | null {
    if (!this.secret) return null;

    if (!isSecretLive(this.secret, now)) {
      this.secret = null;
      return null;
    }

    return this.secret;
  }

  set(secret: Secret): void {
    this.secret = secret;
  }

  clear(): void {
    this.secret = null;
  }
}
