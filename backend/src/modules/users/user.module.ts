/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - userRepo is created by DI and shared with the email-verification module,
 *   which writes account state (verify / expiry cascade).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Queue } from '../../shared/messaging/queue';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';
import type { EmailTokenManager } from '../email-verification';

import type { UserRepo } from './dal/user.repo';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  logger: Logger;
  passwordHasher: PasswordHasher;
  locks: IdentityLockTable;
  queue: Queue;
  userRepo: UserRepo;
  emailTokenManager: EmailTokenManager;
  now?: () => Date;
}) {
  const userService = new UserService({
    db: deps.db,
    logger: deps.logger,
    passwordHasher: deps.passwordHasher,
    locks: deps.locks,
    queue: deps.queue,
    userRepo: deps.userRepo,
    emailTokenManager: deps.emailTokenManager,
    now: deps.now,
  });

  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
