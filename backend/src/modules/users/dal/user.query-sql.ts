/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for accounts (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Accounts } from '../../../shared/db/db.schema';

export type UserRow = Selectable<Accounts>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('accounts')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('accounts').selectAll().where('id', '=', userId).executeTakeFirst();
}

/**
 * Any account holding `email` as its committed email or as a pending
 * prospective email. `excludeUserId` skips the caller's own account.
 */
export async function selectEmailClaimantSql(
  db: DbExecutor,
  params: { email: string; excludeUserId?: string },
): Promise<{ id: string } | undefined> {
  const email = params.email.toLowerCase();

  let query = db
    .selectFrom('accounts')
    .select('id')
    .where((eb) => eb.or([eb('email', '=', email), eb('prospective_email', '=', email)]));

  if (params.excludeUserId) {
    query = query.where('id', '<>', params.excludeUserId);
  }

  return query.executeTakeFirst();
}
