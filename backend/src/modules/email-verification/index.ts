/**
 * backend/src/modules/email-verification/index.ts
 *
 * WHY:
 * - Public surface of the email verification module.
 */

export { EmailTokenManager } from './email-token.manager';
export type { IssuedEmailToken } from './email-token.types';
