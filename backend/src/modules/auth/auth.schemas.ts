/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Id and email formats are the users module's (same rules everywhere).
 * - A missing verify token is not a schema error: it is NOT_FOUND, raised by
 *   the token manager.
 */

import { z } from 'zod';
import { emailSchema, userIdSchema } from '../users';

export const authenticateSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required').max(256),
});

export type AuthenticateInput = z.infer<typeof authenticateSchema>;

export const getAuthTokenSchema = z.object({
  id: userIdSchema,
  email: emailSchema,
  password: z.string().min(1, 'Password is required').max(256),
});

export type GetAuthTokenInput = z.infer<typeof getAuthTokenSchema>;

export const verifyAuthTokenSchema = z.object({
  token: z.string().max(256).optional(),
});

export type VerifyAuthTokenInput = z.infer<typeof verifyAuthTokenSchema>;
