/**
 * backend/src/modules/secrets/index.ts
 *
 * WHY:
 * - Public surface of the secrets module. Other modules import from here,
 *   never from /dal or /queries.
 */

export { SecretManager } from './secret.manager';
export { ActiveSecretCache } from './active-secret.cache';
export { isSecretLive, toSecretDto } from './secret.types';
export type { Secret, SecretDto } from './secret.types';
