/**
 * backend/src/modules/auth/dal/auth-token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for auth tokens.
 *
 * RULES:
 * - One row per account: a re-issue replaces token + secret in place.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class AuthTokenRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AuthTokenRepo {
    return new AuthTokenRepo(db);
  }

  async upsertForUser(params: {
    userId: string;
    token: string;
    secretKey: string;
    createdAt: Date;
  }): Promise<void> {
    await this.db
      .insertInto('auth_tokens')
      .values({
        token: params.token,
        account_id: params.userId,
        secret_key: params.secretKey,
        created_at: params.createdAt,
      })
      .onConflict((oc) =>
        oc.column('account_id').doUpdateSet({
          token: params.token,
          secret_key: params.secretKey,
          created_at: params.createdAt,
        }),
      )
      .execute();
  }
}
