/**
 * backend/src/modules/users/policies/user-record.policy.ts
 *
 * WHY:
 * - Callers must never observe a user without timestamps.
 * - Ids are validated before any storage call.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level UserErrors.
 */

import { UserErrors } from '../user.errors';
import type { User, UserChanges, UserId, UserRecord } from '../user.types';

/** users.id is a Postgres serial (int4). */
export const MAX_USER_ID = 2_147_483_647;

export function assertValidUserId(id: UserId): void {
  if (!Number.isSafeInteger(id) || id <= 0 || id > MAX_USER_ID) {
    throw UserErrors.invalidUserId({ userId: id });
  }
}

/** Returns the record as a User, or undefined while a timestamp is missing. */
export function withTimestamps(record: UserRecord): User | undefined {
  const { createdAt, updatedAt } = record;
  if (createdAt === null || updatedAt === null) return undefined;
  return { ...record, createdAt, updatedAt };
}

/** Changes that fill only the missing timestamps; existing values are kept. */
export function timestampRepair(record: UserRecord, now: Date): UserChanges {
  const changes: UserChanges = {};
  if (record.createdAt === null) changes.createdAt = now;
  if (record.updatedAt === null) changes.updatedAt = now;
  return changes;
}
