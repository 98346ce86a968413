/**
 * src/modules/email-verification/email-verification.schemas.ts
 *
 * RULES:
 * - token is optional at the schema level: a missing or empty token is a
 *   domain error (tokenMissing), raised by the manager.
 */

import { z } from 'zod';

export const verifyEmailSchema = z.object({
  token: z.string().max(256).optional(),
});

export type VerifyEmailInput = z.infer<typeof verifyEmailSchema>;
