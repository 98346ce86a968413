/**
 * src/shared/db/migrations/0003_tokens.ts
 *
 * WHY:
 * - auth_tokens: one row per account, tied to the secret it was issued under.
 * - email_tokens: one pending verification per account, stored as SHA-256 hash only.
 * - Both cascade with the account so deleting an account leaves no orphans.
 */

import { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('auth_tokens')
    .addColumn('token', 'text', (col) => col.primaryKey())
    .addColumn('account_id', 'varchar(26)', (col) =>
      col.notNull().unique().references('accounts.id').onDelete('cascade'),
    )
    .addColumn('secret_key', 'text', (col) => col.notNull().references('secrets.key'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('email_tokens')
    .addColumn('token_hash', 'text', (col) => col.primaryKey())
    .addColumn('account_id', 'varchar(26)', (col) =>
      col.notNull().unique().references('accounts.id').onDelete('cascade'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('email_tokens').ifExists().execute();
  await db.schema.dropTable('auth_tokens').ifExists().execute();
}
