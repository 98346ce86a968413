/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Order matters: request context first (everything logs requestId), then the
 *   error handler, then the availability gate (preHandler on every route).
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 64 * 1024,
  });

  registerRequestContext(app);
  registerErrorHandler(app);
  opts.deps.gate.register(app);

  app.addHook('onRequest', async (req) => {
    withRequestContext(req).info('request');
  });

  app.addHook('onResponse', async (req, reply) => {
    withRequestContext(req).info('response', {
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  return app;
}
