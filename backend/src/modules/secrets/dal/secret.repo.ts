/**
 * backend/src/modules/secrets/dal/secret.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for secrets.
 *
 * RULES:
 * - No transactions started here (SecretManager owns tx).
 * - insertSecret + activateSecret must run in the same transaction, so readers
 *   never see an active_secret row pointing at a missing secret.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export const ACTIVE_SECRET_SLOT = 'current';

export class SecretRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): SecretRepo {
    return new SecretRepo(db);
  }

  async insertSecret(params: { key: string; createdAt: Date; expiresAt: Date }): Promise<void> {
    await this.db
      .insertInto('secrets')
      .values({
        key: params.key,
        created_at: params.createdAt,
        expires_at: params.expiresAt,
      })
      .execute();
  }

  /** Repoints the single active_secret row (insert on first rotation). */
  async activateSecret(params: { key: string; activatedAt: Date }): Promise<void> {
    await this.db
      .insertInto('active_secret')
      .values({
        slot: ACTIVE_SECRET_SLOT,
        secret_key: params.key,
        activated_at: params.activatedAt,
      })
      .onConflict((oc) =>
        oc.column('slot').doUpdateSet({
          secret_key: params.key,
          activated_at: params.activatedAt,
        }),
      )
      .execute();
  }
}
