/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static migration registry. Works the same under tsx (db:migrate), Vitest and
 *   any bundler, without scanning the filesystem for .ts files.
 *
 * RULES:
 * - Append only. Names sort in execution order.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_accounts';
import * as m0002 from './0002_secrets';
import * as m0003 from './0003_tokens';

export const migrations: Record<string, Migration> = {
  '0001_accounts': m0001,
  '0002_secrets': m0002,
  '0003_tokens': m0003,
};
