import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import type { VerifyEmailMessage } from '../../src/shared/messaging/queue';

/**
 * Response shapes + request shortcuts shared by the e2e specs.
 * Bodies are parsed with zod, so a shape drift fails loudly.
 */

export const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const StatusOkSchema = z.object({ status: z.literal('OK') });

export const UserDtoSchema = z
  .object({
    id: z.string(),
    firstName: z.string(),
    lastName: z.string(),
    email: z.string(),
    organization: z.string(),
    isVerified: z.boolean(),
    prospectiveEmail: z.string().nullable(),
    createdAt: z.string(),
  })
  .strict();

export const UserBodySchema = z.object({ user: UserDtoSchema });

export const CreatedUserSchema = z.object({ user: z.object({ id: z.string() }) });

export const SecretDtoSchema = z
  .object({
    key: z.string(),
    createdAt: z.string(),
    expiresAt: z.string(),
  })
  .strict();

export const ActiveSecretBodySchema = z.object({ secret: SecretDtoSchema });

export const IdentificationSchema = z.object({
  token: z.string(),
  secret: SecretDtoSchema,
});

export const AuthTokenBodySchema = z.object({ identification: IdentificationSchema });

export const VerifiedAuthTokenSchema = z.object({
  userId: z.string(),
  identification: IdentificationSchema,
});

export type NewUser = {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
  organization: string;
};

export function newUser(overrides: Partial<NewUser> = {}): NewUser {
  return {
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.com',
    password: 'test-password',
    organization: 'Analytical Engines',
    ...overrides,
  };
}

/** POST /users and return the new id (throws on anything but 201). */
export async function createUser(
  app: FastifyInstance,
  overrides: Partial<NewUser> = {},
): Promise<string> {
  const res = await app.inject({ method: 'POST', url: '/users', payload: newUser(overrides) });
  if (res.statusCode !== 201) {
    throw new Error(`createUser failed: ${res.statusCode} ${res.body}`);
  }
  return CreatedUserSchema.parse(res.json()).user.id;
}

/** Takes the verification mails sent to `userId` off the queue. */
export function takeVerificationMails(queue: InMemQueue, userId: string): VerifyEmailMessage[] {
  return queue.drain((m) => m.userId === userId);
}

/** Token from the single verification mail for `userId`. */
export function takeVerificationToken(queue: InMemQueue, userId: string): string {
  const mails = takeVerificationMails(queue, userId);
  const last = mails[mails.length - 1];
  if (!last) throw new Error(`no verification mail for ${userId}`);
  return last.verificationToken;
}
