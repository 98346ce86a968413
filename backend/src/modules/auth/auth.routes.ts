/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/users/authenticate', controller.authenticate.bind(controller));
  app.post('/auth/token', controller.getAuthToken.bind(controller));
  app.post('/auth/token/verify', controller.verifyAuthToken.bind(controller));
}
