/**
 * src/modules/secrets/secret.module.ts
 *
 * WHY:
 * - Encapsulates Secrets module wiring.
 * - The auth module consumes secretManager; the routes are operator endpoints.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - The cache is passed in so its lifetime belongs to the composition root.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import type { ActiveSecretCache } from './active-secret.cache';
import { SecretRepo } from './dal/secret.repo';
import { SecretManager } from './secret.manager';
import { SecretController } from './secret.controller';
import { registerSecretRoutes } from './secret.routes';

export type SecretModule = ReturnType<typeof createSecretModule>;

export function createSecretModule(deps: {
  db: DbExecutor;
  logger: Logger;
  cache: ActiveSecretCache;
  now?: () => Date;
}) {
  const secretRepo = new SecretRepo(deps.db);
  const secretManager = new SecretManager({
    db: deps.db,
    logger: deps.logger,
    cache: deps.cache,
    secretRepo,
    now: deps.now,
  });
  const controller = new SecretController(secretManager);

  return {
    secretManager,
    registerRoutes(app: FastifyInstance) {
      registerSecretRoutes(app, controller);
    },
  };
}
