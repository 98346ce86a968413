/**
 * backend/src/modules/email-verification/dal/email-token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for email_tokens.
 *
 * RULES:
 * - No transactions started here.
 * - At most one token per account: issuing replaces the previous one.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class EmailTokenRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): EmailTokenRepo {
    return new EmailTokenRepo(db);
  }

  async upsertForUser(params: {
    userId: string;
    tokenHash: string;
    createdAt: Date;
    expiresAt: Date;
  }): Promise<void> {
    await this.db
      .insertInto('email_tokens')
      .values({
        token_hash: params.tokenHash,
        account_id: params.userId,
        created_at: params.createdAt,
        expires_at: params.expiresAt,
      })
      .onConflict((oc) =>
        oc.column('account_id').doUpdateSet({
          token_hash: params.tokenHash,
          created_at: params.createdAt,
          expires_at: params.expiresAt,
        }),
      )
      .execute();
  }

  async deleteByHash(tokenHash: string): Promise<void> {
    await this.db.deleteFrom('email_tokens').where('token_hash', '=', tokenHash).execute();
  }
}
