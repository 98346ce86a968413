/**
 * backend/src/shared/concurrency/rw-lock.ts
 *
 * WHY:
 * - Async reader/writer lock for a single-process Node service.
 * - Readers (shared) overlap each other; a writer (exclusive) runs alone.
 *
 * HOW TO USE:
 * - const release = await lock.acquire('exclusive'); try { ... } finally { release(); }
 * - or: await lock.withLock('shared', async () => { ... })
 *
 * RULES:
 * - Grants are FIFO by arrival. A queued writer blocks readers that arrive after it,
 *   so a steady stream of readers cannot starve a writer.
 * - Consecutive readers at the head of the queue are granted together.
 * - Release is idempotent; calling it twice does not free a slot twice.
 */

export type LockMode = 'shared' | 'exclusive';
export type Release = () => void;

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

export class RwLock {
  private readers = 0;
  private writer = false;
  private readonly waiters: Waiter[] = [];

  acquire(mode: LockMode): Promise<Release> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve(this.releaser(mode));
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push({ mode, grant: () => resolve(this.releaser(mode)) });
    });
  }

  async withLock<T>(mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(mode);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** No holder and nobody waiting. */
  get isIdle(): boolean {
    return !this.writer && this.readers === 0 && this.waiters.length === 0;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writer) return false;
    return mode === 'shared' || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'shared') this.readers += 1;
    else this.writer = true;
  }

  private releaser(mode: LockMode): Release {
    let released = false;

    return () => {
      if (released) return;
      released = true;

      if (mode === 'shared') this.readers -= 1;
      else this.writer = false;

      this.drain();
    };
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) return;

      this.waiters.shift();
      this.take(next.mode);
      next.grant();
    }
  }
}
