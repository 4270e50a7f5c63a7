/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - The only persistence capability UserService depends on.
 * - Lets the service run against Postgres (Kysely) in production and an
 *   in-memory store in tests / local dev, without touching service code.
 *
 * RULES:
 * - transaction() commits when the callback resolves and rolls back when it
 *   rejects (the rejection is rethrown unchanged).
 * - Unique violations surface as errors with code '23505' plus the violated
 *   `constraint` name (see shared/db/pg-errors.ts).
 * - No AppError, no policies: stores return undefined/false, the service decides.
 */

import type { NewUser, UserChanges, UserId, UserRecord } from './user.types';

export const USER_CONSTRAINTS = {
  username: 'users_username_key',
  email: 'users_email_key',
} as const;

export interface UserStoreTx {
  findUserById(id: UserId): Promise<UserRecord | undefined>;
  findUserByUsername(username: string): Promise<UserRecord | undefined>;
  findUserByEmail(email: string): Promise<UserRecord | undefined>;

  /** All matching rows ordered by created_at desc; tie order is unspecified. */
  listUsersNewestFirst(filter: { activeOnly: boolean }): Promise<UserRecord[]>;

  /**
   * Sets every NULL created_at / updated_at to `now`.
   * Returns the number of fields filled (a row missing both counts twice).
   */
  backfillTimestamps(now: Date): Promise<number>;

  insertUser(values: NewUser): Promise<UserRecord>;
  updateUser(id: UserId, changes: UserChanges): Promise<UserRecord | undefined>;
  deleteUser(id: UserId): Promise<boolean>;
}

export interface UserStore {
  transaction<T>(fn: (tx: UserStoreTx) => Promise<T>): Promise<T>;
}
