/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations in DEV/CI reliably.
 * - The same runMigrations() bootstraps the in-process database in tests.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { Migrator } from 'kysely';
import type { Kysely } from 'kysely';
import { pathToFileURL } from 'node:url';

import { migrations } from './migrations';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

export async function runMigrations<T>(db: Kysely<T>): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: { getMigrations: () => Promise.resolve(migrations) },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  if (error) throw error;
}

async function main(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await runMigrations(db);
    logger.info('Migrations up to date');
  } finally {
    await db.destroy();
  }
}

// Only run when executed directly (tests import runMigrations).
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logger.error('Migration failed', { err });
    process.exit(1);
  });
}
