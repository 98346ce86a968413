/**
 * backend/src/shared/db/db-errors.ts
 *
 * WHY:
 * - Services translate a few Postgres failures into domain errors
 *   (e.g. duplicate email → CONFLICT) without depending on the driver's classes.
 */

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}
