/**
 * backend/src/modules/auth/queries/auth-token.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAuthTokenByTokenSql, selectAuthTokenByUserIdSql } from '../dal/auth-token.query-sql';
import type { AuthTokenRow } from '../dal/auth-token.query-sql';
import type { StoredAuthToken } from '../auth.types';

function toStoredAuthToken(row: AuthTokenRow): StoredAuthToken {
  return {
    token: row.token,
    userId: row.account_id,
    createdAt: row.created_at,
    secret: {
      key: row.secret_key,
      createdAt: row.secret_created_at,
      expiresAt: row.secret_expires_at,
    },
  };
}

export async function getAuthTokenForUser(
  db: DbExecutor,
  userId: string,
): Promise<StoredAuthToken | undefined> {
  const row = await selectAuthTokenByUserIdSql(db, userId);
  if (!row) return undefined;
  return toStoredAuthToken(row);
}

export async function getAuthTokenByToken(
  db: DbExecutor,
  token: string,
): Promise<StoredAuthToken | undefined> {
  const row = await selectAuthTokenByTokenSql(db, token);
  if (!row) return undefined;
  return toStoredAuthToken(row);
}
