/**
 * src/shared/db/migrations/0002_secrets.ts
 *
 * WHY:
 * - `secrets` keeps every signing secret ever minted, so an auth token can always
 *   resolve the secret it was issued under.
 * - `active_secret` holds exactly one row: the single source of truth for which
 *   secret is current. Rotation repoints it in the same transaction as the insert.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('secrets')
    .addColumn('key', 'text', (col) => col.primaryKey())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('active_secret')
    .addColumn('slot', 'text', (col) => col.primaryKey())
    .addColumn('secret_key', 'text', (col) => col.notNull().references('secrets.key'))
    .addColumn('activated_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await sql`
    ALTER TABLE active_secret
      ADD CONSTRAINT active_secret_single_row_check
      CHECK (slot = 'current');
  `.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('active_secret').ifExists().execute();
  await db.schema.dropTable('secrets').ifExists().execute();
}
