/**
 * backend/src/modules/secrets/dal/secret.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for secrets.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Secrets } from '../../../shared/db/db.schema';
import { ACTIVE_SECRET_SLOT } from './secret.repo';

export type SecretRow = Selectable<Secrets>;

/** The secret the active_secret row points at, if it has not expired. */
export async function selectActiveSecretSql(
  db: DbExecutor,
  now: Date,
): Promise<SecretRow | undefined> {
  return db
    .selectFrom('active_secret')
    .innerJoin('secrets', 'secrets.key', 'active_secret.secret_key')
    .select(['secrets.key', 'secrets.created_at', 'secrets.expires_at'])
    .where('active_secret.slot', '=', ACTIVE_SECRET_SLOT)
    .where('secrets.expires_at', '>', now)
    .executeTakeFirst();
}
