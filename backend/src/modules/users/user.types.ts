/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one account (committed email and pending prospective email both count).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - The password digest only travels in UserCredentials, never in User.
 */

export type UserId = string;

export type User = {
  id: UserId;
  firstName: string;
  lastName: string;
  email: string;
  organization: string;
  isVerified: boolean;
  /** Pending new email, set by an email change until it is confirmed or expires. */
  prospectiveEmail: string | null;
  createdAt: Date;
};

export type UserCredentials = {
  id: UserId;
  email: string;
  passwordHash: string;
};

export type UserDto = Omit<User, 'createdAt'> & { createdAt: string };

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    organization: user.organization,
    isVerified: user.isVerified,
    prospectiveEmail: user.prospectiveEmail,
    createdAt: user.createdAt.toISOString(),
  };
}
