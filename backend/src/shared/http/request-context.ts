/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Callers that already have a trace id (gateway, other services) pass it via
 *   `x-request-id`; we keep it so one id spans the whole call chain.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 * - The id is echoed back on the `x-request-id` response header.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;

function parseRequestId(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;

  const trimmed = raw.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) return null;

  // keep ids log-safe (no spaces, quotes, control chars)
  return /^[A-Za-z0-9._:-]+$/.test(trimmed) ? trimmed : null;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = parseRequestId(req.headers[REQUEST_ID_HEADER]) ?? randomUUID();

    req.requestContext = { requestId };
    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
