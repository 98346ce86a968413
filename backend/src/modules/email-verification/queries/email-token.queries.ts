/**
 * backend/src/modules/email-verification/queries/email-token.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectEmailTokenByHashSql } from '../dal/email-token.query-sql';
import type { EmailToken } from '../email-token.types';

export async function getEmailTokenByHash(
  db: DbExecutor,
  tokenHash: string,
): Promise<EmailToken | undefined> {
  const row = await selectEmailTokenByHashSql(db, tokenHash);
  if (!row) return undefined;

  return {
    tokenHash: row.token_hash,
    userId: row.account_id,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}
