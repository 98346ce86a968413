/**
 * src/shared/messaging/log-mail-queue.ts
 *
 * WHY:
 * - Production Queue. Hands each verification mail to the outbound-mail
 *   collaborator and forgets it; nothing is retained between requests.
 * - The outbound side is the structured log stream: a mail relay tails
 *   `mail.dispatch` records. SMTP itself is not part of this service.
 *
 * RULES:
 * - Never log the raw verification token or the recipient address.
 * - Only a dispatch counter survives enqueue().
 */

import type { Logger } from '../logger/logger';
import type { Queue, QueueMessage } from './queue';

export class LogMailQueue implements Queue {
  private count = 0;

  constructor(private readonly deps: { logger: Logger }) {}

  enqueue(message: QueueMessage): Promise<void> {
    this.count += 1;

    this.deps.logger.info({
      msg: 'mail.dispatch',
      flow: 'messaging.enqueue',
      type: message.type,
      userId: message.userId,
      reason: message.reason,
      expiresAt: message.expiresAt,
    });

    return Promise.resolve();
  }

  get dispatched(): number {
    return this.count;
  }
}
