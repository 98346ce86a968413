/**
 * src/shared/db/migrations/0001_accounts.ts
 *
 * WHY:
 * - Accounts are the root aggregate: every token row hangs off one.
 * - id is a lowercase ULID minted by the service (not a DB default).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('accounts')
    .addColumn('id', 'varchar(26)', (col) => col.primaryKey())
    .addColumn('first_name', 'varchar(32)', (col) => col.notNull())
    .addColumn('last_name', 'varchar(32)', (col) => col.notNull())
    .addColumn('email', 'varchar(320)', (col) => col.notNull().unique())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('organization', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('is_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('prospective_email', 'varchar(320)')
    .execute();

  await sql`
    ALTER TABLE accounts
      ADD CONSTRAINT accounts_id_length_check
      CHECK (length(id) = 26);
  `.execute(db);

  // Email uniqueness spans email + other accounts' prospective_email;
  // the service checks both, this index keeps that lookup cheap.
  await sql`
    CREATE INDEX accounts_prospective_email_idx
    ON accounts(prospective_email)
    WHERE prospective_email IS NOT NULL;
  `.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('accounts').ifExists().execute();
}
