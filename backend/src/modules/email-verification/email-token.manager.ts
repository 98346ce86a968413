/**
 * backend/src/modules/email-verification/email-token.manager.ts
 *
 * WHY:
 * - Issues and consumes the tokens that prove control of an email address.
 * - Also owns the lazy expiry cascade: an expired token is cleaned up when it is
 *   presented, not by a background sweep.
 *
 * HOW IT WORKS:
 * - issue(): runs INSIDE the caller's transaction (account create / email change),
 *   so the account row and its token commit or roll back together.
 * - verify():
 *   1) missing/empty token → VALIDATION_ERROR
 *   2) no row for hash(token) → NOT_FOUND
 *   3) lock the owning account (exclusive), re-read the row inside a tx
 *   4) expired → delete token; unverified account is deleted, verified account
 *      only loses its prospective email; commit, THEN throw EXPIRED
 *   5) otherwise → mark verified, promote prospective email, consume token
 *
 * RULES:
 * - Expiry writes must survive the error: the transaction returns an outcome and
 *   the error is thrown after commit (never from inside the tx callback).
 * - The identity lock is taken before the transaction, never inside it.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';
import { generateSecureToken } from '../../shared/security/token';
import { isUniqueViolation } from '../../shared/db/db-errors';

import { getUserById, toUser, UserErrors } from '../users';
import type { User, UserRepo } from '../users';

import type { EmailTokenRepo } from './dal/email-token.repo';
import { getEmailTokenByHash } from './queries/email-token.queries';
import {
  decideExpiredEmailTokenAction,
  isEmailTokenExpired,
} from './policies/email-token-expiry.policy';
import type { ExpiredEmailTokenAction } from './policies/email-token-expiry.policy';
import { EmailVerificationErrors } from './email-verification.errors';
import type { IssuedEmailToken } from './email-token.types';

const EMAIL_TOKEN_BYTES = 32;
const HOUR_MS = 60 * 60 * 1000;

type VerifyOutcome =
  | { kind: 'NOT_FOUND'; userGone: boolean }
  | { kind: 'EXPIRED'; userId: string; action: ExpiredEmailTokenAction }
  | { kind: 'VERIFIED'; user: User; emailChanged: boolean };

export class EmailTokenManager {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      tokenHasher: TokenHasher;
      locks: IdentityLockTable;
      emailTokenRepo: EmailTokenRepo;
      userRepo: UserRepo;
      ttlHours: number;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Caller passes its transaction; replaces any earlier token for the account. */
  async issue(params: { db: DbExecutor; userId: string; now: Date }): Promise<IssuedEmailToken> {
    const token = generateSecureToken(EMAIL_TOKEN_BYTES);
    const expiresAt = new Date(params.now.getTime() + this.deps.ttlHours * HOUR_MS);

    await this.deps.emailTokenRepo.withDb(params.db).upsertForUser({
      userId: params.userId,
      tokenHash: this.deps.tokenHasher.hash(token),
      createdAt: params.now,
      expiresAt,
    });

    return { token, expiresAt };
  }

  async verify(params: { token: string | undefined; requestId: string }): Promise<User> {
    if (!params.token) throw EmailVerificationErrors.tokenMissing();

    const tokenHash = this.deps.tokenHasher.hash(params.token);
    const found = await getEmailTokenByHash(this.deps.db, tokenHash);
    if (!found) throw EmailVerificationErrors.tokenNotFound();

    const userId = found.userId;

    const outcome = await this.deps.locks.withExclusive(userId, () =>
      this.consume({ tokenHash, userId, now: this.now() }),
    );

    switch (outcome.kind) {
      case 'NOT_FOUND':
        // consumed (or its account deleted) while we waited for the lock
        if (outcome.userGone) this.deps.locks.evict(userId);
        throw EmailVerificationErrors.tokenNotFound();

      case 'EXPIRED':
        if (outcome.action === 'DELETE_ACCOUNT') this.deps.locks.evict(userId);

        this.deps.logger.info({
          msg: 'email_verification.expired',
          flow: 'email-verification.verify',
          requestId: params.requestId,
          userId,
          action: outcome.action,
        });

        throw EmailVerificationErrors.tokenExpired({ userId, action: outcome.action });

      case 'VERIFIED':
        this.deps.logger.info({
          msg: 'email_verification.verified',
          flow: 'email-verification.verify',
          requestId: params.requestId,
          userId,
          emailChanged: outcome.emailChanged,
        });

        return outcome.user;
    }
  }

  private async consume(params: {
    tokenHash: string;
    userId: string;
    now: Date;
  }): Promise<VerifyOutcome> {
    try {
      return await this.deps.db.transaction().execute(async (trx): Promise<VerifyOutcome> => {
        const emailTokenRepo = this.deps.emailTokenRepo.withDb(trx);
        const userRepo = this.deps.userRepo.withDb(trx);

        const record = await getEmailTokenByHash(trx, params.tokenHash);
        if (!record) {
          // deleting an account cascades to its token
          const owner = await getUserById(trx, params.userId);
          return { kind: 'NOT_FOUND', userGone: owner === undefined };
        }

        const user = await getUserById(trx, record.userId);
        if (!user) return { kind: 'NOT_FOUND', userGone: true };

        if (isEmailTokenExpired(record, params.now)) {
          const action = decideExpiredEmailTokenAction(user);

          await emailTokenRepo.deleteByHash(params.tokenHash);
          if (action === 'DELETE_ACCOUNT') await userRepo.deleteUser(user.id);
          else await userRepo.clearProspectiveEmail(user.id);

          return { kind: 'EXPIRED', userId: user.id, action };
        }

        const row = await userRepo.markVerified({
          userId: user.id,
          email: user.prospectiveEmail ?? user.email,
        });
        if (!row) return { kind: 'NOT_FOUND', userGone: true };

        await emailTokenRepo.deleteByHash(params.tokenHash);

        return {
          kind: 'VERIFIED',
          user: toUser(row),
          emailChanged: user.prospectiveEmail !== null,
        };
      });
    } catch (err) {
      // Promoting a prospective email collided with a committed one.
      if (isUniqueViolation(err)) throw UserErrors.emailTaken();
      throw err;
    }
  }
}
