import { describe, it, expect } from 'vitest';
import { InMemQueue } from '../../../../src/shared/messaging/inmem-queue';
import type { VerifyEmailMessage } from '../../../../src/shared/messaging/queue';

function mail(userId: string): VerifyEmailMessage {
  return {
    type: 'users.verify-email',
    userId,
    email: `${userId}@example.com`,
    firstName: 'Ada',
    verificationToken: `test-token-${userId}`,
    reason: 'account-created',
    expiresAt: '2024-01-05T12:00:00.000Z',
  };
}

describe('InMemQueue', () => {
  it('drain() empties the queue in enqueue order', async () => {
    const queue = new InMemQueue();
    await queue.enqueue(mail('a'));
    await queue.enqueue(mail('b'));

    expect(queue.drain().map((m) => m.userId)).toEqual(['a', 'b']);
    expect(queue.size).toBe(0);
  });

  it('drain(filter) takes only matching messages and keeps the rest', async () => {
    const queue = new InMemQueue();
    await queue.enqueue(mail('a'));
    await queue.enqueue(mail('b'));
    await queue.enqueue(mail('a'));

    const taken = queue.drain((m) => m.userId === 'a');

    expect(taken).toHaveLength(2);
    expect(queue.size).toBe(1);
    expect(queue.drain()[0]?.userId).toBe('b');
  });
});
