/**
 * backend/src/modules/users/dal/user.row.ts
 *
 * WHY:
 * - One place that knows both the snake_case row and the camelCase record.
 */

import type { Insertable, Selectable, Updateable } from 'kysely';
import type { Users } from '../../../shared/db/database.schema';
import type { NewUser, UserChanges, UserRecord } from '../user.types';

export type UserRow = Selectable<Users>;

export function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    role: row.role,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toInsertRow(user: NewUser): Insertable<Users> {
  return {
    username: user.username,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    role: user.role,
    active: user.active,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}

export function toUpdateRow(changes: UserChanges): Updateable<Users> {
  const row: Updateable<Users> = {};

  if (changes.username !== undefined) row.username = changes.username;
  if (changes.email !== undefined) row.email = changes.email;
  if (changes.firstName !== undefined) row.first_name = changes.firstName;
  if (changes.lastName !== undefined) row.last_name = changes.lastName;
  if (changes.role !== undefined) row.role = changes.role;
  if (changes.active !== undefined) row.active = changes.active;
  if (changes.createdAt !== undefined) row.created_at = changes.createdAt;
  if (changes.updatedAt !== undefined) row.updated_at = changes.updatedAt;

  return row;
}
