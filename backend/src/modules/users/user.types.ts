/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are global identities; username and email are each unique
 *   across every row, inactive ones included.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export const USER_ROLES = ['admin', 'user', 'guest'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type UserId = number;

export type User = {
  id: UserId;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  /** false = soft-deleted */
  active: boolean;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * A user exactly as storage holds it. Rows that predate the timestamp
 * columns carry nulls until the service repairs them.
 */
export type UserRecord = Omit<User, 'createdAt' | 'updatedAt'> & {
  createdAt: Date | null;
  updatedAt: Date | null;
};

export type NewUser = Omit<UserRecord, 'id'>;

export type UserChanges = Partial<Omit<UserRecord, 'id'>>;

export type CreateUserInput = {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role?: UserRole;
  active?: boolean;
};

/** Fields a caller may change; absent keys are left untouched. */
export type UpdateUserInput = Partial<
  Pick<User, 'username' | 'email' | 'firstName' | 'lastName' | 'role' | 'active'>
>;

export type UserConflictField = 'username' | 'email' | 'unspecified';

export type UserSlice = {
  users: User[];
  total: number;
};

export type UserListPage = UserSlice & {
  page: number;
  size: number;
  pages: number;
};
