/**
 * backend/src/shared/concurrency/identity-lock-table.ts
 *
 * WHY:
 * - Account ids are minted by this service, and every mutation of one account
 *   (create, update, delete, token issuance, email verification) must be serialized
 *   while different accounts stay fully concurrent.
 * - One RwLock per account id, created lazily on first use.
 *
 * HOW TO USE:
 * - Writers: await locks.withExclusive(userId, async () => { ... })
 * - Readers: await locks.withShared(userId, async () => { ... })
 * - When, holding the lock, the store says the account does not exist (or after
 *   deleting it), call locks.evict(userId).
 *
 * RULES:
 * - Get-or-create is a synchronous Map operation, so two first requests for the
 *   same id always end up on the same lock.
 * - Every entry is reference counted (holders + waiters). evict() only marks the
 *   entry stale; it leaves the table once its last holder/waiter is gone.
 * - Release happens on every exit path (return or throw).
 * - Never acquire an identity lock while inside a DB transaction.
 * - Created once in di.ts and injected. No module-level instance.
 */

import { RwLock } from './rw-lock';
import type { LockMode } from './rw-lock';

type Entry = {
  lock: RwLock;
  refs: number;
  stale: boolean;
};

export class IdentityLockTable {
  private readonly entries = new Map<string, Entry>();

  withExclusive<T>(id: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(id, 'exclusive', fn);
  }

  withShared<T>(id: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(id, 'shared', fn);
  }

  /**
   * Marks the id's entry as reclaimable. Requests already holding or queued on
   * the entry keep using the same lock instance until they finish.
   */
  evict(id: string): void {
    const entry = this.entries.get(id);
    if (!entry) return;

    entry.stale = true;
    this.reap(id, entry);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  private async run<T>(id: string, mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    const entry = this.retain(id);

    try {
      return await entry.lock.withLock(mode, fn);
    } finally {
      entry.refs -= 1;
      this.reap(id, entry);
    }
  }

  private retain(id: string): Entry {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { lock: new RwLock(), refs: 0, stale: false };
      this.entries.set(id, entry);
    }

    entry.refs += 1;
    return entry;
  }

  private reap(id: string, entry: Entry): void {
    if (!entry.stale || entry.refs > 0) return;

    // Only drop the mapping if it still points at this exact entry.
    if (this.entries.get(id) === entry) this.entries.delete(id);
  }
}
