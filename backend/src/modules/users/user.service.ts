/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates account create / read / update / delete.
 * - Only place in the users module allowed to start transactions.
 *
 * RULES:
 * - Every operation runs under the account's identity lock: exclusive for
 *   writes, shared for reads. Lock first, then transaction; never the reverse.
 * - Password hashing happens under the lock but before the transaction.
 * - Email claims are checked inside the writing tx (committed email + other
 *   accounts' prospective emails), serialized per address by an advisory lock.
 * - Verification emails are enqueued only after commit.
 * - When the store says an account is gone, evict its lock entry.
 * - Never log raw passwords or tokens.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Queue, VerifyEmailReason } from '../../shared/messaging/queue';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';
import { generateAccountId } from '../../shared/ids/account-id';
import { isUniqueViolation } from '../../shared/db/db-errors';

import type { EmailTokenManager, IssuedEmailToken } from '../email-verification';

import type { UserRepo } from './dal/user.repo';
import { getUserById, isEmailClaimed, toUser } from './queries/user.queries';
import { UserErrors } from './user.errors';
import type { User } from './user.types';

// ── Params ──────────────────────────────────────────────────

export type CreateUserParams = {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
  organization: string;
  requestId: string;
};

export type UpdateUserParams = {
  userId: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  password?: string;
  organization?: string;
  requestId: string;
};

// ── PII-safe helper ─────────────────────────────────────────
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export class UserService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      passwordHasher: PasswordHasher;
      locks: IdentityLockTable;
      queue: Queue;
      userRepo: UserRepo;
      emailTokenManager: EmailTokenManager;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async createUser(params: CreateUserParams): Promise<{ id: string }> {
    const email = params.email.toLowerCase();
    const userId = generateAccountId(this.now());

    return this.deps.locks.withExclusive(userId, async () => {
      const passwordHash = await this.deps.passwordHasher.hash(params.password);
      const now = this.now();

      let issued: IssuedEmailToken;
      try {
        issued = await this.writeOrConflict(() =>
          this.deps.db.transaction().execute(async (trx) => {
            const userRepo = this.deps.userRepo.withDb(trx);

            await userRepo.lockEmailClaim(email);
            if (await isEmailClaimed(trx, { email })) {
              throw UserErrors.emailTaken({ emailDomain: emailDomain(email) });
            }

            await userRepo.insertUser({
              id: userId,
              firstName: params.firstName,
              lastName: params.lastName,
              email,
              passwordHash,
              organization: params.organization,
              createdAt: now,
            });

            return this.deps.emailTokenManager.issue({ db: trx, userId, now });
          }),
        );
      } catch (err) {
        // rolled back: nothing exists under this id
        this.deps.locks.evict(userId);
        throw err;
      }

      await this.enqueueVerification({
        userId,
        email,
        firstName: params.firstName,
        issued,
        reason: 'account-created',
      });

      this.deps.logger.info({
        msg: 'users.create.success',
        flow: 'users.create',
        requestId: params.requestId,
        userId,
        emailDomain: emailDomain(email),
      });

      return { id: userId };
    });
  }

  async getUser(params: { userId: string; requestId: string }): Promise<User> {
    return this.deps.locks.withShared(params.userId, async () => {
      const user = await getUserById(this.deps.db, params.userId);
      if (!user) {
        this.deps.locks.evict(params.userId);
        throw UserErrors.userNotFound({ userId: params.userId });
      }
      return user;
    });
  }

  async updateUser(params: UpdateUserParams): Promise<User> {
    const { userId } = params;

    return this.deps.locks.withExclusive(userId, async () => {
      const current = await getUserById(this.deps.db, userId);
      if (!current) {
        this.deps.locks.evict(userId);
        throw UserErrors.userNotFound({ userId });
      }

      const requestedEmail = params.email?.toLowerCase();
      const newEmail =
        requestedEmail !== undefined && requestedEmail !== current.email
          ? requestedEmail
          : undefined;

      const passwordHash =
        params.password !== undefined
          ? await this.deps.passwordHasher.hash(params.password)
          : undefined;

      const hasChanges =
        newEmail !== undefined ||
        passwordHash !== undefined ||
        params.firstName !== undefined ||
        params.lastName !== undefined ||
        params.organization !== undefined;

      if (!hasChanges) return current;

      const now = this.now();

      const result = await this.writeOrConflict(() =>
        this.deps.db.transaction().execute(async (trx) => {
          const userRepo = this.deps.userRepo.withDb(trx);
          let issued: IssuedEmailToken | null = null;

          if (newEmail !== undefined) {
            await userRepo.lockEmailClaim(newEmail);
            if (await isEmailClaimed(trx, { email: newEmail, excludeUserId: userId })) {
              throw UserErrors.emailTaken({ userId, emailDomain: emailDomain(newEmail) });
            }
            issued = await this.deps.emailTokenManager.issue({ db: trx, userId, now });
          }

          const row = await userRepo.updateUser(userId, {
            firstName: params.firstName,
            lastName: params.lastName,
            organization: params.organization,
            passwordHash,
            prospectiveEmail: newEmail,
          });
          if (!row) throw UserErrors.userNotFound({ userId });

          return { user: toUser(row), issued };
        }),
      );

      if (result.issued && newEmail !== undefined) {
        await this.enqueueVerification({
          userId,
          email: newEmail,
          firstName: result.user.firstName,
          issued: result.issued,
          reason: 'email-change',
        });
      }

      this.deps.logger.info({
        msg: 'users.update.success',
        flow: 'users.update',
        requestId: params.requestId,
        userId,
        emailChangeRequested: newEmail !== undefined,
        passwordChanged: passwordHash !== undefined,
      });

      return result.user;
    });
  }

  async deleteUser(params: { userId: string; requestId: string }): Promise<void> {
    const { userId } = params;

    await this.deps.locks.withExclusive(userId, async () => {
      const deleted = await this.deps.userRepo.deleteUser(userId);

      // Either way the id no longer maps to an account.
      this.deps.locks.evict(userId);

      if (!deleted) throw UserErrors.userNotFound({ userId });

      this.deps.logger.info({
        msg: 'users.delete.success',
        flow: 'users.delete',
        requestId: params.requestId,
        userId,
      });
    });
  }

  /** Maps a lost race on the accounts.email unique index to the same 409. */
  private async writeOrConflict<T>(write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (err) {
      if (isUniqueViolation(err)) throw UserErrors.emailTaken();
      throw err;
    }
  }

  private async enqueueVerification(params: {
    userId: string;
    email: string;
    firstName: string;
    issued: IssuedEmailToken;
    reason: VerifyEmailReason;
  }): Promise<void> {
    await this.deps.queue.enqueue({
      type: 'users.verify-email',
      userId: params.userId,
      email: params.email,
      firstName: params.firstName,
      verificationToken: params.issued.token,
      reason: params.reason,
      expiresAt: params.issued.expiresAt.toISOString(),
    });
  }
}
