import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { TestClock } from '../helpers/test-clock';
import { ActiveSecretBodySchema, StatusOkSchema } from '../helpers/api';

describe('GET /secrets/active', () => {
  it('creates the first secret lazily, expiring the next Monday 03:00 UTC', async () => {
    const clock = new TestClock('2024-01-03T12:00:00.000Z');
    const { app, db, close } = await buildTestApp({ now: clock.now });

    try {
      const res = await app.inject({ method: 'GET', url: '/secrets/active' });

      expect(res.statusCode).toBe(200);
      const { secret } = ActiveSecretBodySchema.parse(res.json());
      expect(secret.createdAt).toBe('2024-01-03T12:00:00.000Z');
      expect(secret.expiresAt).toBe('2024-01-08T03:00:00.000Z');
      expect(secret.key.length).toBeGreaterThanOrEqual(43);

      const again = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );
      expect(again.secret).toEqual(secret);

      const rows = await db.selectFrom('secrets').select('key').execute();
      expect(rows).toHaveLength(1);
    } finally {
      await close();
    }
  });

  it('concurrent first reads agree on a single secret', async () => {
    const { app, db, close } = await buildTestApp();

    try {
      const responses = await Promise.all(
        Array.from({ length: 5 }, () => app.inject({ method: 'GET', url: '/secrets/active' })),
      );

      const keys = responses.map((r) => ActiveSecretBodySchema.parse(r.json()).secret.key);
      expect(new Set(keys).size).toBe(1);

      const rows = await db.selectFrom('secrets').select('key').execute();
      expect(rows).toHaveLength(1);
    } finally {
      await close();
    }
  });

  it('reloads the persisted secret after the in-memory copy is lost', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const before = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );

      deps.secretCache.clear();

      const after = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );
      expect(after.secret).toEqual(before.secret);
    } finally {
      await close();
    }
  });

  it('replaces an expired secret on the next read', async () => {
    const clock = new TestClock('2024-01-03T12:00:00.000Z');
    const { app, close } = await buildTestApp({ now: clock.now });

    try {
      const first = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );

      clock.advanceHours(24 * 5); // Monday 2024-01-08T12:00Z

      const second = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );
      expect(second.secret.key).not.toBe(first.secret.key);
      expect(second.secret.createdAt).toBe('2024-01-08T12:00:00.000Z');
      expect(second.secret.expiresAt).toBe('2024-01-15T03:00:00.000Z');
    } finally {
      await close();
    }
  });
});

describe('POST /secrets/rotate', () => {
  it('creates and activates a new secret expiring at the next Monday 03:00 UTC', async () => {
    const clock = new TestClock('2024-01-07T12:00:00.000Z'); // Sunday
    const { app, db, close } = await buildTestApp({ now: clock.now });

    try {
      const before = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );

      clock.advanceHours(2);

      const res = await app.inject({ method: 'POST', url: '/secrets/rotate' });
      expect(res.statusCode).toBe(201);
      expect(StatusOkSchema.parse(res.json())).toEqual({ status: 'OK' });

      const after = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );
      expect(after.secret.key).not.toBe(before.secret.key);
      expect(after.secret.createdAt).toBe('2024-01-07T14:00:00.000Z');
      expect(after.secret.expiresAt).toBe('2024-01-08T03:00:00.000Z');

      const active = await db
        .selectFrom('active_secret')
        .select('secret_key')
        .executeTakeFirstOrThrow();
      expect(active.secret_key).toBe(after.secret.key);

      const rows = await db.selectFrom('secrets').select('key').execute();
      expect(rows).toHaveLength(2);
    } finally {
      await close();
    }
  });

  it('works on an empty store; rotating exactly at Monday 03:00 expires a week later', async () => {
    const clock = new TestClock('2024-01-08T03:00:00.000Z');
    const { app, db, close } = await buildTestApp({ now: clock.now });

    try {
      const res = await app.inject({ method: 'POST', url: '/secrets/rotate' });
      expect(res.statusCode).toBe(201);

      const { secret } = ActiveSecretBodySchema.parse(
        (await app.inject({ method: 'GET', url: '/secrets/active' })).json(),
      );
      expect(secret.expiresAt).toBe('2024-01-15T03:00:00.000Z');

      const rows = await db.selectFrom('secrets').select('key').execute();
      expect(rows).toHaveLength(1);
    } finally {
      await close();
    }
  });
});
