/**
 * backend/src/modules/users/policies/user-conflict.policy.ts
 *
 * WHY:
 * - A unique violation can reach the service even after the pre-check
 *   (two concurrent creates both pass the lookup; only one insert wins).
 * - The loser must get a Conflict naming the field, never a generic 500.
 *
 * RULES:
 * - Pure functions only.
 * - Constraint name first; violation detail ("Key (email)=...") as fallback.
 */

import type { UniqueViolation } from '../../../shared/db/pg-errors';
import { USER_CONSTRAINTS } from '../user.store';
import type { UserConflictField } from '../user.types';

function mentions(text: string | null, column: 'username' | 'email'): boolean {
  return text !== null && text.toLowerCase().includes(column);
}

export function classifyUniqueViolation(violation: UniqueViolation): UserConflictField {
  const { constraint, detail } = violation;

  if (constraint === USER_CONSTRAINTS.username) return 'username';
  if (constraint === USER_CONSTRAINTS.email) return 'email';

  if (mentions(constraint, 'username') || mentions(detail, 'username')) return 'username';
  if (mentions(constraint, 'email') || mentions(detail, 'email')) return 'email';

  return 'unspecified';
}
