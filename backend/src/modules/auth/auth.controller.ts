/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for credential and token endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Secret metadata is serialized via toSecretDto (ISO timestamps).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { toSecretDto } from '../secrets';
import { authenticateSchema, getAuthTokenSchema, verifyAuthTokenSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type { AuthIdentification, AuthIdentificationDto } from './auth.types';

function toIdentificationDto(identification: AuthIdentification): AuthIdentificationDto {
  return {
    token: identification.token,
    secret: toSecretDto(identification.secret),
  };
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async authenticate(req: FastifyRequest, reply: FastifyReply) {
    const parsed = authenticateSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.authService.authenticate({
      email: parsed.data.email,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ status: 'OK' });
  }

  async getAuthToken(req: FastifyRequest, reply: FastifyReply) {
    const parsed = getAuthTokenSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const identification = await this.authService.getAuthToken({
      userId: parsed.data.id,
      email: parsed.data.email,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ identification: toIdentificationDto(identification) });
  }

  async verifyAuthToken(req: FastifyRequest, reply: FastifyReply) {
    const parsed = verifyAuthTokenSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const verified = await this.authService.verifyAuthToken({
      token: parsed.data.token,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({
      userId: verified.userId,
      identification: toIdentificationDto(verified.identification),
    });
  }
}
