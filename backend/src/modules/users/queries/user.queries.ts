/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectEmailClaimantSql,
  selectUserByEmailSql,
  selectUserByIdSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserCredentials } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    organization: row.organization,
    isVerified: row.is_verified,
    prospectiveEmail: row.prospective_email ?? null,
    createdAt: row.created_at,
  };
}

function toCredentials(row: UserRow): UserCredentials {
  return { id: row.id, email: row.email, passwordHash: row.password_hash };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserCredentialsById(
  db: DbExecutor,
  userId: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toCredentials(row);
}

export async function getUserCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toCredentials(row);
}

export async function isEmailClaimed(
  db: DbExecutor,
  params: { email: string; excludeUserId?: string },
): Promise<boolean> {
  const claimant = await selectEmailClaimantSql(db, params);
  return claimant !== undefined;
}
