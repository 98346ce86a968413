/**
 * backend/src/modules/email-verification/dal/email-token.query-sql.ts
 *
 * RULES:
 * - DAL reads only. Lookup is by hash; raw tokens never reach SQL.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { EmailTokens } from '../../../shared/db/db.schema';

export type EmailTokenRow = Selectable<EmailTokens>;

export async function selectEmailTokenByHashSql(
  db: DbExecutor,
  tokenHash: string,
): Promise<EmailTokenRow | undefined> {
  return db
    .selectFrom('email_tokens')
    .selectAll()
    .where('token_hash', '=', tokenHash)
    .executeTakeFirst();
}
