import { describe, it, expect } from 'vitest';
import { nextSecretExpiration } from '../../../src/modules/secrets/policies/secret-expiration.policy';

function at(iso: string): Date {
  return new Date(iso);
}

describe('nextSecretExpiration', () => {
  it('mid-week → the coming Monday 03:00 UTC', () => {
    expect(nextSecretExpiration(at('2024-01-03T12:00:00.000Z')).toISOString()).toBe(
      '2024-01-08T03:00:00.000Z',
    );
  });

  it('Sunday night → the next morning', () => {
    expect(nextSecretExpiration(at('2024-01-07T23:30:00.000Z')).toISOString()).toBe(
      '2024-01-08T03:00:00.000Z',
    );
  });

  it('Monday before 03:00 → same day', () => {
    expect(nextSecretExpiration(at('2024-01-01T01:00:00.000Z')).toISOString()).toBe(
      '2024-01-01T03:00:00.000Z',
    );
  });

  it('Monday exactly 03:00 → following Monday', () => {
    expect(nextSecretExpiration(at('2024-01-01T03:00:00.000Z')).toISOString()).toBe(
      '2024-01-08T03:00:00.000Z',
    );
  });

  it('crosses a year boundary', () => {
    expect(nextSecretExpiration(at('2024-12-31T18:00:00.000Z')).toISOString()).toBe(
      '2025-01-06T03:00:00.000Z',
    );
  });

  it('is always strictly in the future and at most a week away', () => {
    const now = at('2024-03-14T09:15:00.000Z');
    const exp = nextSecretExpiration(now);

    expect(exp.getTime()).toBeGreaterThan(now.getTime());
    expect(exp.getTime() - now.getTime()).toBeLessThanOrEqual(7 * 24 * 60 * 60 * 1000);
    expect(exp.getUTCDay()).toBe(1);
  });
});
