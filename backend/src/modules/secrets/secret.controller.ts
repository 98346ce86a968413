/**
 * src/modules/secrets/secret.controller.ts
 *
 * WHY:
 * - Maps HTTP → SecretManager for the operator endpoints.
 *
 * RULES:
 * - No DB access here.
 * - Secret metadata goes out as ISO strings (toSecretDto).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { SecretManager } from './secret.manager';
import { toSecretDto } from './secret.types';
import { withRequestContext } from '../../shared/logger/with-context';

export class SecretController {
  constructor(private readonly secretManager: SecretManager) {}

  /** MakeNewSecret: supersede the active secret with a fresh one. */
  async rotate(req: FastifyRequest, reply: FastifyReply) {
    const secret = await this.secretManager.rotate();

    withRequestContext(req).info('secrets.rotate.requested', {
      flow: 'secrets.rotate',
      expiresAt: secret.expiresAt.toISOString(),
    });

    return reply.status(201).send({ status: 'OK' });
  }

  /** GetSecret: the active secret, created on demand if none is live. */
  async getActive(_req: FastifyRequest, reply: FastifyReply) {
    const secret = await this.secretManager.getActive();
    return reply.status(200).send({ secret: toSecretDto(secret) });
  }
}
