/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/status)
 *   - module routes (users, auth, email verification, secrets)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + module registerRoutes.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Reaching this handler means the availability gate passed.
  app.get('/status', (req) => {
    return {
      status: opts.deps.gate.current,
      service: opts.config.serviceName,
      env: opts.config.nodeEnv,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.users.registerRoutes(app);
  opts.deps.auth.registerRoutes(app);
  opts.deps.emailVerification.registerRoutes(app);
  opts.deps.secrets.registerRoutes(app);
}
