/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching the service.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Wire format is snake_case; the controller maps to domain names.
 */

import { z } from 'zod';
import { USER_ROLES } from './user.types';
import { MAX_PAGE_SIZE } from './policies/user-pagination.policy';
import { MAX_USER_ID } from './policies/user-record.policy';

// Lengths count characters (code points) like varchar(n), not UTF-16 units.
function charLength(value: string): number {
  return [...value].length;
}

function chars(min: number, max: number) {
  return z
    .string()
    .refine((value) => charLength(value) >= min && charLength(value) <= max, {
      message: `Must be between ${min} and ${max} characters`,
    });
}

const username = chars(3, 50);
const email = z
  .string()
  .email()
  .refine((value) => charLength(value) <= 255, { message: 'Must be at most 255 characters' });
const personName = chars(1, 100);
const role = z.enum(USER_ROLES);

export const createUserSchema = z.object({
  username,
  email,
  first_name: personName,
  last_name: personName,
  role: role.default('user'),
  active: z.boolean().default(true),
});

export type CreateUserBody = z.infer<typeof createUserSchema>;

/** Partial update: only the keys present are applied. */
export const updateUserSchema = z.object({
  username: username.optional(),
  email: email.optional(),
  first_name: personName.optional(),
  last_name: personName.optional(),
  role: role.optional(),
  active: z.boolean().optional(),
});

export type UpdateUserBody = z.infer<typeof updateUserSchema>;

export const userIdParamsSchema = z.object({
  userId: z.coerce.number().int().positive().max(MAX_USER_ID),
});

const booleanQuery = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const listUsersQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(10),
  active_only: booleanQuery.default('true'),
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
