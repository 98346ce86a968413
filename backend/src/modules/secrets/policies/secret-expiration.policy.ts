/**
 * backend/src/modules/secrets/policies/secret-expiration.policy.ts
 *
 * WHY:
 * - Secrets are time-boxed to calendar weeks. A leaked key is useful for at most
 *   one week, and we never pay rotation cost per request.
 *
 * RULES:
 * - Pure function, no IO.
 * - Result is the Monday 03:00 UTC strictly after `now`
 *   (Monday 02:59 → same day 03:00; Monday 03:00 → the following Monday).
 */

const MONDAY = 1;
const ROTATION_HOUR_UTC = 3;
const DAYS_PER_WEEK = 7;

export function nextSecretExpiration(now: Date): Date {
  const daysUntilMonday = (MONDAY - now.getUTCDay() + DAYS_PER_WEEK) % DAYS_PER_WEEK;

  const boundary = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate() + daysUntilMonday,
      ROTATION_HOUR_UTC,
    ),
  );

  if (boundary.getTime() <= now.getTime()) {
    boundary.setUTCDate(boundary.getUTCDate() + DAYS_PER_WEEK);
  }

  return boundary;
}
