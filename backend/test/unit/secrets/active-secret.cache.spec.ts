import { describe, it, expect } from 'vitest';
import { ActiveSecretCache } from '../../../src/modules/secrets';

const secret = {
  key: 'test-secret-key',
  createdAt: new Date('2024-01-03T12:00:00.000Z'),
  expiresAt: new Date('2024-01-08T03:00:00.000Z'),
};

describe('ActiveSecretCache', () => {
  it('is empty until set', () => {
    const cache = new ActiveSecretCache();
    expect(cache.get(new Date('2024-01-04T00:00:00.000Z'))).toBeNull();
  });

  it('returns the secret while it is live', () => {
    const cache = new ActiveSecretCache();
    cache.set(secret);

    expect(cache.get(new Date('2024-01-08T02:59:59.999Z'))).toBe(secret);
  });

  it('drops the secret at its expiry instant', () => {
    const cache = new ActiveSecretCache();
    cache.set(secret);

    expect(cache.get(new Date('2024-01-08T03:00:00.000Z'))).toBeNull();
    // dropped, not just hidden
    expect(cache.get(new Date('2024-01-04T00:00:00.000Z'))).toBeNull();
  });

  it('clear() empties it', () => {
    const cache = new ActiveSecretCache();
    cache.set(secret);
    cache.clear();

    expect(cache.get(new Date('2024-01-04T00:00:00.000Z'))).toBeNull();
  });
});
