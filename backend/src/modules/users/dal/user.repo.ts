/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for accounts (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export type UserPatch = {
  firstName?: string;
  lastName?: string;
  organization?: string;
  passwordHash?: string;
  prospectiveEmail?: string;
};

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Serializes email claims for one address until the surrounding transaction ends.
   * Email uniqueness spans two columns, which no single index can enforce.
   */
  async lockEmailClaim(email: string): Promise<void> {
    await sql`select pg_advisory_xact_lock(hashtext(${email.toLowerCase()}))`.execute(this.db);
  }

  /** Email must be globally unique (DB constraint backs the service check). */
  async insertUser(params: {
    id: string;
    firstName: string;
    lastName: string;
    email: string;
    passwordHash: string;
    organization: string;
    createdAt: Date;
  }): Promise<UserRow> {
    return this.db
      .insertInto('accounts')
      .values({
        id: params.id,
        first_name: params.firstName,
        last_name: params.lastName,
        email: params.email.toLowerCase(),
        password_hash: params.passwordHash,
        organization: params.organization,
        created_at: params.createdAt,
        is_verified: false,
        prospective_email: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Undefined fields are left untouched. Returns undefined if the account is gone. */
  async updateUser(userId: string, patch: UserPatch): Promise<UserRow | undefined> {
    return this.db
      .updateTable('accounts')
      .set({
        first_name: patch.firstName,
        last_name: patch.lastName,
        organization: patch.organization,
        password_hash: patch.passwordHash,
        prospective_email: patch.prospectiveEmail?.toLowerCase(),
      })
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  /** Marks verified and commits `email` (the promoted prospective email, or the current one). */
  async markVerified(params: { userId: string; email: string }): Promise<UserRow | undefined> {
    return this.db
      .updateTable('accounts')
      .set({
        is_verified: true,
        email: params.email.toLowerCase(),
        prospective_email: null,
      })
      .where('id', '=', params.userId)
      .returningAll()
      .executeTakeFirst();
  }

  async clearProspectiveEmail(userId: string): Promise<void> {
    await this.db
      .updateTable('accounts')
      .set({ prospective_email: null })
      .where('id', '=', userId)
      .execute();
  }

  /** Returns true if a row was deleted. Tokens go with it (ON DELETE CASCADE). */
  async deleteUser(userId: string): Promise<boolean> {
    const res = await this.db.deleteFrom('accounts').where('id', '=', userId).executeTakeFirst();
    return Number(res?.numDeletedRows ?? 0) > 0;
  }
}
