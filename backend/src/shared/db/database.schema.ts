/**
 * backend/src/shared/db/database.schema.ts
 *
 * WHY:
 * - Kysely needs one interface describing every table it may touch.
 * - Kept next to the migrations; a column change means touching both.
 *
 * RULES:
 * - Mirror the SQL types exactly (nullable columns stay nullable here).
 * - No domain logic.
 */

import type { ColumnType, Generated } from 'kysely';

export type UserRoleValue = 'admin' | 'user' | 'guest';

// Legacy rows may carry NULL timestamps; new writes always set them.
type NullableTimestamp = ColumnType<Date | null, Date | null | undefined, Date | null>;

export interface Users {
  id: Generated<number>;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: Generated<UserRoleValue>;
  active: Generated<boolean>;
  created_at: NullableTimestamp;
  updated_at: NullableTimestamp;
}

export interface DB {
  users: Users;
}
