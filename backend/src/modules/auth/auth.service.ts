/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates credential checks (AuthenticateUser) and auth-token
 *   issuance/verification (GetAuthToken, VerifyAuthToken).
 *
 * RULES:
 * - Token issuance runs under the account's exclusive identity lock, so two
 *   concurrent GetAuthToken calls for one account cannot both mint a token.
 * - Unknown account → NOT_FOUND; wrong password or mismatched email → UNAUTHORIZED.
 * - Never store/log raw passwords or tokens.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { IdentityLockTable } from '../../shared/concurrency/identity-lock-table';

import { getUserCredentialsByEmail, getUserCredentialsById, UserErrors } from '../users';

import type { AuthTokenManager } from './auth-token.manager';
import { AuthErrors } from './auth.errors';
import type { AuthIdentification, VerifiedAuthToken } from './auth.types';

export type AuthenticateParams = {
  email: string;
  password: string;
  requestId: string;
};

export type GetAuthTokenParams = {
  userId: string;
  email: string;
  password: string;
  requestId: string;
};

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      passwordHasher: PasswordHasher;
      locks: IdentityLockTable;
      authTokenManager: AuthTokenManager;
    },
  ) {}

  async authenticate(params: AuthenticateParams): Promise<{ userId: string }> {
    const creds = await getUserCredentialsByEmail(this.deps.db, params.email);
    if (!creds) throw UserErrors.userNotFound();

    const ok = await this.deps.passwordHasher.verify(params.password, creds.passwordHash);
    if (!ok) {
      this.deps.logger.warn({
        msg: 'auth.authenticate.failed',
        flow: 'auth.authenticate',
        requestId: params.requestId,
        userId: creds.id,
      });
      throw AuthErrors.invalidCredentials({ userId: creds.id });
    }

    return { userId: creds.id };
  }

  async getAuthToken(params: GetAuthTokenParams): Promise<AuthIdentification> {
    const { userId } = params;

    return this.deps.locks.withExclusive(userId, async () => {
      const creds = await getUserCredentialsById(this.deps.db, userId);
      if (!creds) {
        this.deps.locks.evict(userId);
        throw UserErrors.userNotFound({ userId });
      }

      if (creds.email !== params.email.toLowerCase()) {
        throw AuthErrors.invalidCredentials({ userId, reason: 'email_mismatch' });
      }

      const ok = await this.deps.passwordHasher.verify(params.password, creds.passwordHash);
      if (!ok) throw AuthErrors.invalidCredentials({ userId, reason: 'password_mismatch' });

      const identification = await this.deps.authTokenManager.issue(userId);

      this.deps.logger.info({
        msg: 'auth.token.granted',
        flow: 'auth.token.issue',
        requestId: params.requestId,
        userId,
      });

      return identification;
    });
  }

  async verifyAuthToken(params: {
    token: string | undefined;
    requestId: string;
  }): Promise<VerifiedAuthToken> {
    return this.deps.authTokenManager.verify(params.token);
  }
}
