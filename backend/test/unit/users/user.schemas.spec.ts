import { describe, it, expect } from 'vitest';
import {
  createUserSchema,
  nameSchema,
  newPasswordSchema,
  updateUserSchema,
} from '../../../src/modules/users/user.schemas';

const valid = {
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  password: 'correct-horse',
  organization: 'Analytical Engines',
};

describe('nameSchema', () => {
  it.each(['Ada', 'Mary-Jane', "O'Neil", 'St. John', 'Jr.', 'Van Dyke'])('accepts %s', (name) => {
    expect(nameSchema.safeParse(name).success).toBe(true);
  });

  it.each(['', 'R2D2', 'Ada  Lovelace', '-Ada', 'a'.repeat(33), 'Zoë'])('rejects %j', (name) => {
    expect(nameSchema.safeParse(name).success).toBe(false);
  });

  it('trims surrounding whitespace', () => {
    expect(nameSchema.parse('  Ada ')).toBe('Ada');
  });
});

describe('newPasswordSchema', () => {
  it('requires at least 8 characters', () => {
    expect(newPasswordSchema.safeParse('short').success).toBe(false);
    expect(newPasswordSchema.safeParse('12345678').success).toBe(true);
  });

  it('limits passwords to 72 bytes, counting multi-byte characters', () => {
    expect(newPasswordSchema.safeParse('a'.repeat(72)).success).toBe(true);
    expect(newPasswordSchema.safeParse('a'.repeat(73)).success).toBe(false);
    // 36 x 'é' is 36 chars but 72 bytes; one more pushes it over
    expect(newPasswordSchema.safeParse('é'.repeat(36)).success).toBe(true);
    expect(newPasswordSchema.safeParse('é'.repeat(37)).success).toBe(false);
  });
});

describe('createUserSchema', () => {
  it('accepts a complete payload', () => {
    expect(createUserSchema.safeParse(valid).success).toBe(true);
  });

  it('rejects a missing field', () => {
    expect(createUserSchema.safeParse({ ...valid, organization: undefined }).success).toBe(false);
  });

  it('rejects an invalid email', () => {
    expect(createUserSchema.safeParse({ ...valid, email: 'not-an-email' }).success).toBe(false);
  });
});

describe('updateUserSchema', () => {
  it('accepts a single field', () => {
    expect(updateUserSchema.safeParse({ organization: 'New Org' }).success).toBe(true);
  });

  it('rejects an empty body', () => {
    expect(updateUserSchema.safeParse({}).success).toBe(false);
  });

  it('rejects unknown fields', () => {
    expect(updateUserSchema.safeParse({ isVerified: true }).success).toBe(false);
  });
});
