/**
 * src/modules/email-verification/email-verification.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { verifyEmailSchema } from './email-verification.schemas';
import type { EmailTokenManager } from './email-token.manager';

export class EmailVerificationController {
  constructor(private readonly emailTokenManager: EmailTokenManager) {}

  async verifyEmail(req: FastifyRequest, reply: FastifyReply) {
    const parsed = verifyEmailSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.emailTokenManager.verify({
      token: parsed.data.token,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ status: 'OK' });
  }
}
