/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely table interfaces for every table the migrations create.
 * - Kept next to the migrations so a schema change and its types land together.
 *
 * RULES:
 * - snake_case, mirrors the columns exactly.
 * - Generated<> for columns with a DB default the app may omit on insert.
 * - Only DAL / queries import these row types; services use domain types.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface Accounts {
  id: string;
  first_name: string;
  last_name: string;
  email: string;
  password_hash: string;
  organization: string;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
  is_verified: Generated<boolean>;
  prospective_email: string | null;
}

export interface Secrets {
  key: string;
  created_at: Timestamp;
  expires_at: Timestamp;
}

export interface ActiveSecret {
  slot: string;
  secret_key: string;
  activated_at: Timestamp;
}

export interface AuthTokens {
  token: string;
  account_id: string;
  secret_key: string;
  created_at: Timestamp;
}

export interface EmailTokens {
  token_hash: string;
  account_id: string;
  created_at: Timestamp;
  expires_at: Timestamp;
}

export interface DB {
  accounts: Accounts;
  secrets: Secrets;
  active_secret: ActiveSecret;
  auth_tokens: AuthTokens;
  email_tokens: EmailTokens;
}
