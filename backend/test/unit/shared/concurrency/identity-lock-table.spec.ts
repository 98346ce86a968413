import { describe, it, expect } from 'vitest';
import { IdentityLockTable } from '../../../../src/shared/concurrency/identity-lock-table';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('IdentityLockTable', () => {
  it('serializes exclusive work on the same id', async () => {
    const locks = new IdentityLockTable();
    const order: string[] = [];
    const gate = deferred();

    const first = locks.withExclusive('acct-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = locks.withExclusive('acct-1', () => {
      order.push('second');
    });

    for (let i = 0; i < 5; i += 1) await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different ids wait on each other', async () => {
    const locks = new IdentityLockTable();
    const gate = deferred();

    const blocked = locks.withExclusive('acct-1', () => gate.promise);
    const other = await locks.withExclusive('acct-2', () => 'done');

    expect(other).toBe('done');

    gate.resolve();
    await blocked;
  });

  it('keeps entries for live ids', async () => {
    const locks = new IdentityLockTable();

    await locks.withShared('acct-1', () => undefined);

    expect(locks.has('acct-1')).toBe(true);
    expect(locks.size).toBe(1);
  });

  it('drops an evicted entry once its holders are gone', async () => {
    const locks = new IdentityLockTable();

    await locks.withExclusive('acct-1', () => {
      locks.evict('acct-1');
      // still held: the entry stays until the holder leaves
      expect(locks.has('acct-1')).toBe(true);
    });

    expect(locks.has('acct-1')).toBe(false);
  });

  it('keeps an evicted entry until queued waiters finish, then drops it', async () => {
    const locks = new IdentityLockTable();
    const holderGate = deferred();
    const waiterGate = deferred();

    const holder = locks.withExclusive('acct-1', async () => {
      await holderGate.promise;
      locks.evict('acct-1');
    });
    const waiter = locks.withShared('acct-1', async () => {
      await waiterGate.promise;
      return 'read';
    });

    holderGate.resolve();
    await holder;
    // the waiter now holds the same entry
    expect(locks.has('acct-1')).toBe(true);

    waiterGate.resolve();
    await expect(waiter).resolves.toBe('read');
    expect(locks.has('acct-1')).toBe(false);
  });

  it('releases and propagates when the work throws', async () => {
    const locks = new IdentityLockTable();

    await expect(
      locks.withExclusive('acct-1', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(locks.withExclusive('acct-1', () => 'next')).resolves.toBe('next');
  });

  it('evicting an unknown id is a no-op', () => {
    const locks = new IdentityLockTable();
    locks.evict('missing');
    expect(locks.size).toBe(0);
  });
});
