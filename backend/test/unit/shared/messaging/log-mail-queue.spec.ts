import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { PGlite } from '@electric-sql/pglite';
import { Kysely } from 'kysely';

import { buildApp } from '../../../../src/app/build-app';
import type { AppConfig } from '../../../../src/app/config';
import type { DB } from '../../../../src/shared/db/db.schema';
import { runMigrations } from '../../../../src/shared/db/migrate';
import { LogMailQueue } from '../../../../src/shared/messaging/log-mail-queue';
import type { VerifyEmailMessage } from '../../../../src/shared/messaging/queue';
import { PGliteDialect } from '../../../helpers/pglite-dialect';
import { newUser } from '../../../helpers/api';

function mail(userId: string): VerifyEmailMessage {
  return {
    type: 'users.verify-email',
    userId,
    email: `${userId}@example.com`,
    firstName: 'Ada',
    verificationToken: `test-token-${userId}`,
    reason: 'email-change',
    expiresAt: '2024-01-05T12:00:00.000Z',
  };
}

describe('LogMailQueue', () => {
  it('dispatches each mail to the log without the token or recipient', async () => {
    const log = winston.createLogger({ silent: true });
    const info = vi.spyOn(log, 'info');
    const queue = new LogMailQueue({ logger: log });

    await queue.enqueue(mail('a'));

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith({
      msg: 'mail.dispatch',
      flow: 'messaging.enqueue',
      type: 'users.verify-email',
      userId: 'a',
      reason: 'email-change',
      expiresAt: '2024-01-05T12:00:00.000Z',
    });
  });

  it('counts dispatches and holds no messages', async () => {
    const queue = new LogMailQueue({ logger: winston.createLogger({ silent: true }) });

    for (const id of ['a', 'b', 'c']) await queue.enqueue(mail(id));

    expect(queue.dispatched).toBe(3);
    expect(Object.values(queue).some(Array.isArray)).toBe(false);
  });

  it('is the queue the app uses when none is injected', async () => {
    const pg = new PGlite();
    const db = new Kysely<DB>({ dialect: new PGliteDialect(pg) });
    await runMigrations(db);

    const config: AppConfig = {
      nodeEnv: 'test',
      port: 0,
      databaseUrl: 'pglite://memory',
      logLevel: 'error',
      serviceName: 'user-svc-test',
      bcryptCost: 4,
      emailTokenTtlHours: 48,
    };
    const built = await buildApp(config, { db });

    try {
      for (const n of [1, 2, 3]) {
        const res = await built.app.inject({
          method: 'POST',
          url: '/users',
          payload: newUser({ email: `signup${n}@example.com` }),
        });
        expect(res.statusCode).toBe(201);
      }

      const queue = built.deps.queue;
      expect(queue).toBeInstanceOf(LogMailQueue);
      if (queue instanceof LogMailQueue) expect(queue.dispatched).toBe(3);
    } finally {
      await built.close();
      await db.destroy();
      await pg.close();
    }
  });
});
