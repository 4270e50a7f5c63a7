/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Services need to tell a unique-constraint failure apart from any other
 *   storage failure without depending on the pg driver classes.
 *
 * RULES:
 * - Structural checks only (works for pg's DatabaseError and for test stand-ins).
 * - No AppError here; modules decide what a violation means.
 */

export const PG_UNIQUE_VIOLATION = '23505';

export type UniqueViolation = {
  constraint: string | null;
  detail: string | null;
};

function readString(err: object, key: 'constraint' | 'detail'): string | null {
  if (!(key in err)) return null;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : null;
}

export function asUniqueViolation(err: unknown): UniqueViolation | null {
  if (!err || typeof err !== 'object') return null;
  if (!('code' in err) || err.code !== PG_UNIQUE_VIOLATION) return null;

  return {
    constraint: readString(err, 'constraint'),
    detail: readString(err, 'detail'),
  };
}
