/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> UserService.
 * - Validates params/body and shapes responses (never the password digest).
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { createUserSchema, updateUserSchema, userIdParamsSchema } from './user.schemas';
import type { UserService } from './user.service';
import { toUserDto } from './user.types';

function parseUserId(req: FastifyRequest): string {
  const parsed = userIdParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.validationError('Invalid user id', { issues: parsed.error.issues });
  }
  return parsed.data.id;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { id } = await this.userService.createUser({
      ...parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ user: { id } });
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = parseUserId(req);

    const user = await this.userService.getUser({
      userId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ user: toUserDto(user) });
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = parseUserId(req);

    const parsed = updateUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.updateUser({
      ...parsed.data,
      userId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ user: toUserDto(user) });
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = parseUserId(req);

    await this.userService.deleteUser({
      userId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ status: 'OK' });
  }
}
