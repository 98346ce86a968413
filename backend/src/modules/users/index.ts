/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 * - Keep exports minimal; add more only when explicitly required.
 */

export {
  getUserById,
  getUserCredentialsByEmail,
  getUserCredentialsById,
  toUser,
} from './queries/user.queries';
export { UserErrors } from './user.errors';
export { emailSchema, userIdSchema } from './user.schemas';
export type { User, UserCredentials } from './user.types';
export type { UserRepo } from './dal/user.repo';
