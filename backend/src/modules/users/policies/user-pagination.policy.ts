/**
 * backend/src/modules/users/policies/user-pagination.policy.ts
 *
 * WHY:
 * - Listing fetches every matching row and pages in memory, so `total`
 *   always reflects the whole filtered set, not the page.
 *
 * RULES:
 * - Pure functions only.
 * - page is 1-based; pages is 1 when there are no rows.
 */

import { AppError } from '../../../shared/http/errors';

export function pageToSlice(page: number, size: number): { skip: number; limit: number } {
  return { skip: (page - 1) * size, limit: size };
}

export function slicePage<T>(rows: readonly T[], skip: number, limit: number): T[] {
  return rows.slice(skip, skip + limit);
}

export function countPages(total: number, size: number): number {
  return total > 0 ? Math.ceil(total / size) : 1;
}

export const MAX_PAGE_SIZE = 100;

function isNonNegativeInt(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function assertValidSlice(skip: number, limit: number): void {
  if (!isNonNegativeInt(skip) || !isNonNegativeInt(limit) || limit < 1) {
    throw AppError.validationError('Invalid pagination', { skip, limit });
  }
}

export function assertValidPage(page: number, size: number): void {
  if (!isNonNegativeInt(page) || page < 1 || !isNonNegativeInt(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw AppError.validationError('Invalid pagination', { page, size });
  }
}
