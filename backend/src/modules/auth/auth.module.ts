/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';
import type { SecretManager } from '../secrets';

import { AuthTokenRepo } from './dal/auth-token.repo';
import { AuthTokenManager } from './auth-token.manager';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor;
  logger: Logger;
  passwordHasher: PasswordHasher;
  locks: IdentityLockTable;
  secretManager: SecretManager;
  now?: () => Date;
}) {
  const authTokenRepo = new AuthTokenRepo(deps.db);

  const authTokenManager = new AuthTokenManager({
    db: deps.db,
    logger: deps.logger,
    secretManager: deps.secretManager,
    authTokenRepo,
    now: deps.now,
  });

  const authService = new AuthService({
    db: deps.db,
    logger: deps.logger,
    passwordHasher: deps.passwordHasher,
    locks: deps.locks,
    authTokenManager,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    authTokenManager,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
