/**
 * backend/src/shared/db/make-migration.ts
 *
 * WHY:
 * - "One command" way to create a new migration file.
 * - Kysely doesn't auto-generate migrations; this writes the numbered
 *   skeleton with `up()` and `down()`.
 *
 * HOW TO USE:
 * - npm run db:make --workspace @user-admin/backend -- add_users_phone
 * - Creates src/shared/db/migrations/0003_add_users_phone.ts
 */

import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger/logger';

function normalizeMigrationName(input: string): string {
  // "Add Users Phone" -> "add_users_phone"
  return input
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

function getNextMigrationNumber(existingFiles: string[]): string {
  const numbers = existingFiles
    .map((file) => file.match(/^(\d{4})_/))
    .filter((m): m is RegExpMatchArray => Boolean(m))
    .map((m) => Number(m[1]));

  const max = numbers.length ? Math.max(...numbers) : 0;
  return String(max + 1).padStart(4, '0');
}

function buildMigrationFileContents(fileName: string): string {
  return `/**
 * src/shared/db/migrations/${fileName}
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // TODO: implement schema changes
}

export async function down(db: Kysely<unknown>): Promise<void> {
  // TODO: revert schema changes
}
`;
}

function main(): void {
  const rawName = process.argv[2];

  if (!rawName) {
    logger.error('Missing migration name', { example: 'npm run db:make -- add_users_phone' });
    process.exit(1);
  }

  const safeName = normalizeMigrationName(rawName);

  // The package script runs from backend/, so process.cwd() is backend/.
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  fs.mkdirSync(migrationsDir, { recursive: true });

  const fileName = `${getNextMigrationNumber(fs.readdirSync(migrationsDir))}_${safeName}.ts`;
  const fullPath = path.join(migrationsDir, fileName);

  if (fs.existsSync(fullPath)) {
    logger.error('Migration already exists', { fileName });
    process.exit(1);
  }

  fs.writeFileSync(fullPath, buildMigrationFileContents(fileName), 'utf8');
  logger.info('Created migration', { path: fullPath });
}

main();
