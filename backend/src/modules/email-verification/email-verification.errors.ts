/**
 * backend/src/modules/email-verification/email-verification.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include raw tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const EmailVerificationErrors = {
  tokenMissing(meta?: AppErrorMeta) {
    return AppError.validationError('Verification token is required', meta);
  },

  tokenNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Verification token not found', meta);
  },

  /** Past its TTL. The token (and an unverified account) are already gone. */
  tokenExpired(meta?: AppErrorMeta) {
    return AppError.expired('Verification token has expired', meta);
  },
} as const;
