import { describe, it, expect } from 'vitest';
import { RwLock } from '../../../../src/shared/concurrency/rw-lock';

/** Lets queued grants (promise resolutions) run. */
async function flush(): Promise<void> {
  for (let i = 0; i < 5; i += 1) await Promise.resolve();
}

describe('RwLock', () => {
  it('lets shared holders overlap', async () => {
    const lock = new RwLock();

    const a = await lock.acquire('shared');
    const b = await lock.acquire('shared');

    expect(lock.pending).toBe(0);

    a();
    b();
    expect(lock.isIdle).toBe(true);
  });

  it('makes an exclusive request wait for readers to finish', async () => {
    const lock = new RwLock();
    const reader = await lock.acquire('shared');

    let writerIn = false;
    const writer = lock.acquire('exclusive').then((release) => {
      writerIn = true;
      return release;
    });

    await flush();
    expect(writerIn).toBe(false);
    expect(lock.pending).toBe(1);

    reader();
    const release = await writer;
    expect(writerIn).toBe(true);

    release();
    expect(lock.isIdle).toBe(true);
  });

  it('queues readers that arrive behind a waiting writer', async () => {
    const lock = new RwLock();
    const order: string[] = [];

    const first = await lock.acquire('shared');

    const writer = lock.withLock('exclusive', () => {
      order.push('writer');
    });
    const lateReader = lock.withLock('shared', () => {
      order.push('late-reader');
    });

    await flush();
    expect(order).toEqual([]);

    first();
    await Promise.all([writer, lateReader]);

    expect(order).toEqual(['writer', 'late-reader']);
  });

  it('grants consecutive queued readers together', async () => {
    const lock = new RwLock();
    const writer = await lock.acquire('exclusive');

    let active = 0;
    let maxActive = 0;
    const read = () =>
      lock.withLock('shared', async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await flush();
        active -= 1;
      });

    const readers = [read(), read(), read()];
    writer();
    await Promise.all(readers);

    expect(maxActive).toBe(3);
  });

  it('releases on throw', async () => {
    const lock = new RwLock();

    await expect(
      lock.withLock('exclusive', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isIdle).toBe(true);
  });

  it('ignores a second release call', async () => {
    const lock = new RwLock();
    const a = await lock.acquire('shared');
    const b = await lock.acquire('shared');

    a();
    a();

    let writerIn = false;
    const writer = lock.acquire('exclusive').then((release) => {
      writerIn = true;
      return release;
    });

    await flush();
    expect(writerIn).toBe(false);

    b();
    (await writer)();
    expect(writerIn).toBe(true);
  });
});
