/**
 * src/modules/email-verification/email-verification.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { EmailVerificationController } from './email-verification.controller';

export function registerEmailVerificationRoutes(
  app: FastifyInstance,
  controller: EmailVerificationController,
) {
  app.post('/email/verify', controller.verifyEmail.bind(controller));
}
