/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages the service enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to take the verification mails (optionally only one account's), then
 *   assert on their contents.
 * - Production uses LogMailQueue; tests inject this one through
 *   DepsOverrides.queue.
 *
 * RULES:
 * - Implements Queue interface only. No extra methods visible to services.
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  get size(): number {
    return this.messages.length;
  }

  /**
   * Removes and returns the messages matching `filter` (all of them when omitted),
   * keeping the rest queued in order.
   */
  drain(filter?: (message: QueueMessage) => boolean): QueueMessage[] {
    if (!filter) return this.messages.splice(0, this.messages.length);

    const taken: QueueMessage[] = [];
    const kept: QueueMessage[] = [];
    for (const message of this.messages) {
      (filter(message) ? taken : kept).push(message);
    }

    this.messages.splice(0, this.messages.length, ...kept);
    return taken;
  }
}
