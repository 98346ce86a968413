/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  /** Email is someone's committed email or someone else's pending email change. */
  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email is already in use', meta);
  },
} as const;
