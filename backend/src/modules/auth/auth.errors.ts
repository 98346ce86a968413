/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Password (or email/id pairing) does not match the stored account. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  /** Verify called without a token. */
  tokenMissing(meta?: AppErrorMeta) {
    return AppError.notFound('No auth token supplied', meta);
  },

  tokenNotRecognized(meta?: AppErrorMeta) {
    return AppError.unauthorized('No matching auth token', meta);
  },

  /** The secret the token was issued under has expired. */
  tokenExpired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Auth token has expired', meta);
  },
} as const;
