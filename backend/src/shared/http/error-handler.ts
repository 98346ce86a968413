/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (malformed JSON, wrong content-type) → 4xx VALIDATION_ERROR.
 * - Unknown routes → 404 NOT_FOUND in the same envelope.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'authToken',
  'verificationToken',
  'password',
  'passwordHash',
  'secret',
  'key',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Schema errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });

      return reply
        .status(400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request body'));
    }

    // 3) Fastify-level client errors (bad JSON, unsupported media type, body too large)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        fastifyCode: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return reply
      .status(404)
      .send(buildResponse('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}
