/**
 * src/shared/db/migrations/0002_users_created_at_index.ts
 *
 * WHY:
 * - Listings are always ordered newest-first by created_at.
 *
 * RULES:
 * - Additive migration only (safe).
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createIndex('users_created_at_idx')
    .on('users')
    .column('created_at desc')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex('users_created_at_idx').ifExists().execute();
}
