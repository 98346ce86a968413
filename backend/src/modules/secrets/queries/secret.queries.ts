/**
 * backend/src/modules/secrets/queries/secret.queries.ts
 *
 * WHY:
 * - Shape secret rows into the Secret domain type.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectActiveSecretSql } from '../dal/secret.query-sql';
import type { SecretRow } from '../dal/secret.query-sql';
import type { Secret } from '../secret.types';

export function toSecret(row: SecretRow): Secret {
  return {
    key: row.key,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}

export async function getActiveSecret(db: DbExecutor, now: Date): Promise<Secret | undefined> {
  const row = await selectActiveSecretSql(db, now);
  if (!row) return undefined;
  return toSecret(row);
}
