/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services (nothing is locked,
 *   hashed or written before these pass).
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email normalized to lowercase in service, not here.
 * - Field schemas are exported so the auth module validates the same way.
 */

import { z } from 'zod';
import { ACCOUNT_ID_PATTERN } from '../../shared/ids/account-id';
import { MAX_PASSWORD_BYTES, passwordByteLength } from '../../shared/security/password-hasher';

// Letters, with single separators (space, period, apostrophe, hyphen) between parts:
// "Mary-Jane", "O'Neil", "St. John", "Jr.". No nested quantifiers over the same chars.
const NAME_PATTERN = /^[A-Za-z]+(?:(?:[.'-] ?| )[A-Za-z]+)*\.?$/;

export const nameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(32, 'Name must be at most 32 characters')
  .regex(NAME_PATTERN, 'Name contains invalid characters');

export const emailSchema = z.string().trim().max(320).email('Invalid email address');

export const newPasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .refine((p) => passwordByteLength(p) <= MAX_PASSWORD_BYTES, {
    message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes`,
  });

export const organizationSchema = z
  .string()
  .trim()
  .min(1, 'Organization is required')
  .max(200, 'Organization must be at most 200 characters');

export const userIdSchema = z.string().regex(ACCOUNT_ID_PATTERN, 'Invalid user id');

export const userIdParamsSchema = z.object({
  id: userIdSchema,
});

export type UserIdParams = z.infer<typeof userIdParamsSchema>;

export const createUserSchema = z.object({
  firstName: nameSchema,
  lastName: nameSchema,
  email: emailSchema,
  password: newPasswordSchema,
  organization: organizationSchema,
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const updateUserSchema = z
  .object({
    firstName: nameSchema.optional(),
    lastName: nameSchema.optional(),
    email: emailSchema.optional(),
    password: newPasswordSchema.optional(),
    organization: organizationSchema.optional(),
  })
  .strict()
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateUserInput = z.infer<typeof updateUserSchema>;
