/**
 * backend/src/modules/auth/auth-token.manager.ts
 *
 * WHY:
 * - Issues and verifies per-account auth tokens.
 *
 * HOW IT WORKS:
 * - issue(userId): the caller has already checked credentials and holds the
 *   account's exclusive lock.
 *   - stored token whose secret is still live → returned unchanged (same token,
 *     same secret metadata, byte for byte)
 *   - otherwise → fresh random token bound to the active secret, replacing the row
 * - verify(token): missing → NOT_FOUND; unknown → UNAUTHORIZED;
 *   issued under an expired secret → UNAUTHORIZED; else the owner + secret.
 *
 * RULES:
 * - A token lives exactly as long as the secret it was issued under
 *   (expiresAt > now). A manual rotation does not revoke tokens issued under
 *   the previous, still unexpired secret.
 * - Never log raw tokens.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { generateSecureToken } from '../../shared/security/token';
import { isSecretLive } from '../secrets';
import type { SecretManager } from '../secrets';

import type { AuthTokenRepo } from './dal/auth-token.repo';
import { getAuthTokenByToken, getAuthTokenForUser } from './queries/auth-token.queries';
import { AuthErrors } from './auth.errors';
import type { AuthIdentification, VerifiedAuthToken } from './auth.types';

const AUTH_TOKEN_BYTES = 32;

export class AuthTokenManager {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      secretManager: SecretManager;
      authTokenRepo: AuthTokenRepo;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async issue(userId: string): Promise<AuthIdentification> {
    const active = await this.deps.secretManager.getActive();
    const now = this.now();

    const existing = await getAuthTokenForUser(this.deps.db, userId);
    if (existing && isSecretLive(existing.secret, now)) {
      return { token: existing.token, secret: existing.secret };
    }

    const token = generateSecureToken(AUTH_TOKEN_BYTES);

    await this.deps.authTokenRepo.upsertForUser({
      userId,
      token,
      secretKey: active.key,
      createdAt: now,
    });

    this.deps.logger.info({
      msg: 'auth.token.issued',
      flow: 'auth.token.issue',
      userId,
      replaced: existing !== undefined,
      secretExpiresAt: active.expiresAt.toISOString(),
    });

    return { token, secret: active };
  }

  async verify(token: string | undefined): Promise<VerifiedAuthToken> {
    if (!token) throw AuthErrors.tokenMissing();

    const stored = await getAuthTokenByToken(this.deps.db, token);
    if (!stored) throw AuthErrors.tokenNotRecognized();

    if (!isSecretLive(stored.secret, this.now())) {
      throw AuthErrors.tokenExpired({ userId: stored.userId });
    }

    return {
      userId: stored.userId,
      identification: { token: stored.token, secret: stored.secret },
    };
  }
}
