/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Services enqueue messages; the transport (SMTP relay, SES, etc.) is wired at
 *   the DI layer only. The service never changes when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Raw verification token is allowed here: it travels to the email renderer so
 *   the confirmation link can be built. Only its hash is stored.
 * - Never put password hashes or auth tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type VerifyEmailReason = 'account-created' | 'email-change';

export type VerifyEmailMessage = {
  type: 'users.verify-email';
  userId: string;
  /** Address the link is sent to (the prospective one for an email change). */
  email: string;
  firstName: string;
  /** Raw (un-hashed) verification token. Goes into the email link only. */
  verificationToken: string;
  reason: VerifyEmailReason;
  expiresAt: string;
};

export type QueueMessage = VerifyEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
