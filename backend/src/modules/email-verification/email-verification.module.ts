/**
 * src/modules/email-verification/email-verification.module.ts
 *
 * WHY:
 * - Encapsulates email verification wiring.
 * - The users module consumes emailTokenManager.issue() inside its transactions.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';
import type { UserRepo } from '../users';

import { EmailTokenRepo } from './dal/email-token.repo';
import { EmailTokenManager } from './email-token.manager';
import { EmailVerificationController } from './email-verification.controller';
import { registerEmailVerificationRoutes } from './email-verification.routes';

export type EmailVerificationModule = ReturnType<typeof createEmailVerificationModule>;

export function createEmailVerificationModule(deps: {
  db: DbExecutor;
  logger: Logger;
  tokenHasher: TokenHasher;
  locks: IdentityLockTable;
  userRepo: UserRepo;
  ttlHours: number;
  now?: () => Date;
}) {
  const emailTokenRepo = new EmailTokenRepo(deps.db);

  const emailTokenManager = new EmailTokenManager({
    db: deps.db,
    logger: deps.logger,
    tokenHasher: deps.tokenHasher,
    locks: deps.locks,
    emailTokenRepo,
    userRepo: deps.userRepo,
    ttlHours: deps.ttlHours,
    now: deps.now,
  });

  const controller = new EmailVerificationController(emailTokenManager);

  return {
    emailTokenManager,
    registerRoutes(app: FastifyInstance) {
      registerEmailVerificationRoutes(app, controller);
    },
  };
}
