/**
 * src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.post('/users', controller.createUser.bind(controller));
  app.get('/users/:id', controller.getUser.bind(controller));
  app.patch('/users/:id', controller.updateUser.bind(controller));
  app.delete('/users/:id', controller.deleteUser.bind(controller));
}
