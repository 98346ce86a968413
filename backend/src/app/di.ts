/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool, lock table, secret cache) and shares them.
 * - Keeps modules testable (tests inject an in-process db).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Lock table and secret cache live here, not as module-level singletons.
 *
 * WIRING ORDER:
 * - users and email-verification need each other (account creation issues an
 *   email token; verification rewrites the account). The UserRepo is created
 *   here and handed to both, so neither module constructs the other.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { LogMailQueue } from '../shared/messaging/log-mail-queue';
import type { Queue } from '../shared/messaging/queue';

import { IdentityLockTable } from '../shared/concurrency/identity-lock-table';
import { ServiceGate } from '../shared/availability/service-gate';

import { ActiveSecretCache } from '../modules/secrets';
import { createSecretModule } from '../modules/secrets/secret.module';
import type { SecretModule } from '../modules/secrets/secret.module';

import { UserRepo } from '../modules/users/dal/user.repo';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createEmailVerificationModule } from '../modules/email-verification/email-verification.module';
import type { EmailVerificationModule } from '../modules/email-verification/email-verification.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;

  logger: Logger;

  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  locks: IdentityLockTable;
  secretCache: ActiveSecretCache;
  gate: ServiceGate;

  // messaging
  queue: Queue;

  // modules
  secrets: SecretModule;
  emailVerification: EmailVerificationModule;
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  /** Pre-built database (tests pass an in-process one). Not destroyed by close(). */
  db?: Db;
  queue?: Queue;
  now?: () => Date;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const ownsDb = overrides.db === undefined;
  const db = overrides.db ?? createDb(config.databaseUrl);
  const now = overrides.now;

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // tests inject an InMemQueue to read the mails back
  const queue: Queue = overrides.queue ?? new LogMailQueue({ logger });

  const locks = new IdentityLockTable();
  const secretCache = new ActiveSecretCache();
  const gate = new ServiceGate({ db, logger });

  // modules (no HTTP / no business logic here)
  const secrets = createSecretModule({ db, logger, cache: secretCache, now });

  const userRepo = new UserRepo(db);

  const emailVerification = createEmailVerificationModule({
    db,
    logger,
    tokenHasher,
    locks,
    userRepo,
    ttlHours: config.emailTokenTtlHours,
    now,
  });

  const users = createUserModule({
    db,
    logger,
    passwordHasher,
    locks,
    queue,
    userRepo,
    emailTokenManager: emailVerification.emailTokenManager,
    now,
  });

  const auth = createAuthModule({
    db,
    logger,
    passwordHasher,
    locks,
    secretManager: secrets.secretManager,
    now,
  });

  return {
    db,
    logger,
    tokenHasher,
    passwordHasher,
    locks,
    secretCache,
    gate,
    queue,
    secrets,
    emailVerification,
    users,
    auth,
    close: async () => {
      secretCache.clear();
      if (ownsDb) await db.destroy();
    },
  };
}
