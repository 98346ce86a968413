import { describe, it, expect } from 'vitest';
import { decodeTime } from 'ulid';
import {
  ACCOUNT_ID_LENGTH,
  generateAccountId,
  isAccountId,
} from '../../../../src/shared/ids/account-id';

describe('generateAccountId', () => {
  it('produces a lowercase 26-char ULID carrying the given timestamp', () => {
    const at = new Date('2030-05-01T10:00:00.000Z');
    const id = generateAccountId(at);

    expect(id).toHaveLength(ACCOUNT_ID_LENGTH);
    expect(id).toBe(id.toLowerCase());
    expect(isAccountId(id)).toBe(true);
    expect(decodeTime(id.toUpperCase())).toBe(at.getTime());
  });

  it('is strictly increasing within one millisecond', () => {
    const at = new Date('2030-05-01T10:00:01.000Z');
    const ids = Array.from({ length: 50 }, () => generateAccountId(at));

    const sorted = [...ids].sort();
    expect(ids).toEqual(sorted);
    expect(new Set(ids).size).toBe(50);
  });
});

describe('isAccountId', () => {
  it('rejects malformed ids', () => {
    expect(isAccountId('')).toBe(false);
    expect(isAccountId('01hzzzzzzzzzzzzzzzzzzzzzz')).toBe(false); // 25 chars
    expect(isAccountId('01HV3K8Y7Z6X5W4V3T2S1R0Q9P')).toBe(false); // uppercase
    expect(isAccountId('01hv3k8y7z6x5w4v3t2s1r0q9u')).toBe(false); // 'u' not in alphabet
    expect(isAccountId('81hv3k8y7z6x5w4v3t2s1r0q9p')).toBe(false); // timestamp overflow
  });

  it('accepts a well-formed lowercase id', () => {
    expect(isAccountId('01hv3k8y7z6x5w4v3t2s1r0q9p')).toBe(true);
  });
});
