/**
 * src/modules/secrets/secret.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { SecretController } from './secret.controller';

export function registerSecretRoutes(app: FastifyInstance, controller: SecretController) {
  app.post('/secrets/rotate', controller.rotate.bind(controller));
  app.get('/secrets/active', controller.getActive.bind(controller));
}
