/**
 * backend/src/modules/auth/dal/auth-token.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for auth tokens, always joined with the secret they were
 *   issued under (liveness is decided from that secret).
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';

export type AuthTokenRow = {
  token: string;
  account_id: string;
  created_at: Date;
  secret_key: string;
  secret_created_at: Date;
  secret_expires_at: Date;
};

function selectAuthTokens(db: DbExecutor) {
  return db
    .selectFrom('auth_tokens')
    .innerJoin('secrets', 'secrets.key', 'auth_tokens.secret_key')
    .select([
      'auth_tokens.token',
      'auth_tokens.account_id',
      'auth_tokens.created_at',
      'auth_tokens.secret_key',
      'secrets.created_at as secret_created_at',
      'secrets.expires_at as secret_expires_at',
    ]);
}

export async function selectAuthTokenByUserIdSql(
  db: DbExecutor,
  userId: string,
): Promise<AuthTokenRow | undefined> {
  return selectAuthTokens(db).where('auth_tokens.account_id', '=', userId).executeTakeFirst();
}

export async function selectAuthTokenByTokenSql(
  db: DbExecutor,
  token: string,
): Promise<AuthTokenRow | undefined> {
  return selectAuthTokens(db).where('auth_tokens.token', '=', token).executeTakeFirst();
}
