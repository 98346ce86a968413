/**
 * backend/src/modules/secrets/secret.manager.ts
 *
 * WHY:
 * - Owns the single active signing secret.
 * - getActive() is on the hot path of every token issue/verify; rotate() is rare.
 *
 * HOW IT WORKS:
 * - getActive():
 *   1) cache hit (not expired) → return it
 *   2) otherwise, under the rotation lock: re-check cache, read the persisted
 *      active row, and only if there is none, rotate
 * - rotate(): new key + expiry (next Monday 03:00 UTC), insert + repoint the
 *   active_secret row in one transaction, then refresh the cache.
 *
 * RULES:
 * - Many callers racing on "no active secret" produce exactly one rotation:
 *   the check-then-create runs behind one exclusive lock.
 * - Explicit rotate() takes the same lock, so it never interleaves with a lazy one.
 * - Never called from inside a DB transaction.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { RwLock } from '../../shared/concurrency/rw-lock';
import { generateSecureToken } from '../../shared/security/token';

import type { ActiveSecretCache } from './active-secret.cache';
import type { SecretRepo } from './dal/secret.repo';
import { getActiveSecret } from './queries/secret.queries';
import { nextSecretExpiration } from './policies/secret-expiration.policy';
import type { Secret } from './secret.types';

const SECRET_KEY_BYTES = 32;

type RotationTrigger = 'lazy' | 'manual';

export class SecretManager {
  private readonly rotationLock = new RwLock();
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      cache: ActiveSecretCache;
      secretRepo: SecretRepo;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async getActive(): Promise<Secret> {
    const cached = this.deps.cache.get(this.now());
    if (cached) return cached;

    return this.rotationLock.withLock('exclusive', async () => {
      const now = this.now();

      // Another caller may have filled the cache while we waited.
      const raced = this.deps.cache.get(now);
      if (raced) return raced;

      const stored = await getActiveSecret(this.deps.db, now);
      if (stored) {
        this.deps.cache.set(stored);
        return stored;
      }

      return this.rotateLocked('lazy');
    });
  }

  async rotate(): Promise<Secret> {
    return this.rotationLock.withLock('exclusive', () => this.rotateLocked('manual'));
  }

  private async rotateLocked(trigger: RotationTrigger): Promise<Secret> {
    const now = this.now();
    const secret: Secret = {
      key: generateSecureToken(SECRET_KEY_BYTES),
      createdAt: now,
      expiresAt: nextSecretExpiration(now),
    };

    await this.deps.db.transaction().execute(async (trx) => {
      const secretRepo = this.deps.secretRepo.withDb(trx);

      await secretRepo.insertSecret(secret);
      await secretRepo.activateSecret({ key: secret.key, activatedAt: now });
    });

    this.deps.cache.set(secret);

    this.deps.logger.info({
      msg: 'secrets.rotated',
      flow: 'secrets.rotate',
      trigger,
      expiresAt: secret.expiresAt.toISOString(),
    });

    return secret;
  }
}
