/**
 * backend/src/shared/availability/service-gate.ts
 *
 * WHY:
 * - Every operation first checks that the service is accepting work and that
 *   the database answers. A request that would fail halfway is rejected up front
 *   with UNAVAILABLE instead.
 * - Operators (and shutdown) can flip the service to UNAVAILABLE without
 *   stopping the listener, so in-flight requests drain while new ones are refused.
 *
 * HOW TO USE:
 * - Created once in di.ts; registered as a global preHandler in app/server.ts.
 * - index.ts calls markUnavailable() on SIGTERM/SIGINT before closing.
 *
 * RULES:
 * - The liveness probe is a plain `select 1` on the shared pool, never inside a tx.
 */

import { sql } from 'kysely';
import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../db/db';
import type { Logger } from '../logger/logger';
import { AppError } from '../http/errors';

export type ServiceState = 'AVAILABLE' | 'UNAVAILABLE';

export class ServiceGate {
  private state: ServiceState = 'AVAILABLE';

  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
    },
  ) {}

  get current(): ServiceState {
    return this.state;
  }

  markUnavailable(reason: string): void {
    if (this.state === 'UNAVAILABLE') return;
    this.state = 'UNAVAILABLE';
    this.deps.logger.warn({ msg: 'service.unavailable', flow: 'service.gate', reason });
  }

  markAvailable(): void {
    if (this.state === 'AVAILABLE') return;
    this.state = 'AVAILABLE';
    this.deps.logger.info({ msg: 'service.available', flow: 'service.gate' });
  }

  /** Throws UNAVAILABLE when marked down or when the database does not answer. */
  async assertReady(): Promise<void> {
    if (this.state === 'UNAVAILABLE') {
      throw AppError.unavailable('Service is unavailable');
    }

    try {
      await sql`select 1`.execute(this.deps.db);
    } catch (err) {
      this.deps.logger.error({
        msg: 'service.db_unreachable',
        flow: 'service.gate',
        err,
      });
      throw AppError.unavailable('Database is unreachable');
    }
  }

  register(app: FastifyInstance): void {
    app.addHook('preHandler', async () => {
      await this.assertReady();
    });
  }
}
