import { describe, it, expect } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { Kysely } from 'kysely';

import { ServiceGate } from '../../../../src/shared/availability/service-gate';
import type { DB } from '../../../../src/shared/db/db.schema';
import { AppError } from '../../../../src/shared/http/errors';
import { logger } from '../../../../src/shared/logger/logger';
import { PGliteDialect } from '../../../helpers/pglite-dialect';

async function openDb() {
  const pg = new PGlite();
  const db = new Kysely<DB>({ dialect: new PGliteDialect(pg) });
  return { pg, db };
}

describe('ServiceGate', () => {
  it('passes while available and the database answers', async () => {
    const { pg, db } = await openDb();
    const gate = new ServiceGate({ db, logger });

    try {
      await expect(gate.assertReady()).resolves.toBeUndefined();
      expect(gate.current).toBe('AVAILABLE');
    } finally {
      await db.destroy();
      await pg.close();
    }
  });

  it('refuses with UNAVAILABLE once marked down, and recovers', async () => {
    const { pg, db } = await openDb();
    const gate = new ServiceGate({ db, logger });

    try {
      gate.markUnavailable('maintenance');
      expect(gate.current).toBe('UNAVAILABLE');

      const err = await gate.assertReady().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AppError);
      expect(err).toMatchObject({ code: 'UNAVAILABLE', status: 503 });

      gate.markAvailable();
      await expect(gate.assertReady()).resolves.toBeUndefined();
    } finally {
      await db.destroy();
      await pg.close();
    }
  });

  it('refuses with UNAVAILABLE when the database does not answer', async () => {
    const { pg, db } = await openDb();
    const gate = new ServiceGate({ db, logger });

    await pg.close();

    const err = await gate.assertReady().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({
      code: 'UNAVAILABLE',
      status: 503,
      message: 'Database is unreachable',
    });
  });
});
