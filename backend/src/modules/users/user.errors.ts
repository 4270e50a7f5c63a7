/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Conflicts carry `meta.field` so callers can tell which uniqueness rule fired.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { UserConflictField } from './user.types';

const CONFLICT_MESSAGES: Record<UserConflictField, string> = {
  username: 'Username already exists',
  email: 'Email already exists',
  unspecified: 'User already exists',
};

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  invalidUserId(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid user ID', meta);
  },

  conflict(field: UserConflictField, meta?: AppErrorMeta) {
    return AppError.conflict(CONFLICT_MESSAGES[field], { ...meta, field });
  },

  timestampRepairFailed(meta?: AppErrorMeta) {
    return AppError.internal('User timestamps could not be repaired', meta);
  },
} as const;
