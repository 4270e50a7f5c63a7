/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and at deploy time.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && 'up' in mod && typeof mod.up === 'function';
}

function tsMigrationProvider(migrationsDir: string): MigrationProvider {
  return {
    async getMigrations() {
      const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

      logger.info('Found migration files', { count: files.length, files });

      const migrations: Record<string, Migration> = {};

      for (const file of files) {
        const url = pathToFileURL(path.join(migrationsDir, file)).href;

        // tsx will allow importing TS here
        const mod: unknown = await import(url);
        if (!isMigration(mod)) {
          throw new Error(`Migration ${file} does not export up()`);
        }

        migrations[file.replace(/\.ts$/, '')] = mod;
      }

      return migrations;
    },
  };
}

async function runMigrations(): Promise<void> {
  const config = buildConfig();

  if (config.storage.driver !== 'postgres') {
    logger.warn('Migrations skipped', { storageDriver: config.storage.driver });
    return;
  }

  const db = createDb(config.storage.databaseUrl);

  // Point directly to the SOURCE migrations folder (avoids dist/path confusion).
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  const migrator = new Migrator({ db, provider: tsMigrationProvider(migrationsDir) });

  try {
    const { error, results } = await migrator.migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
      if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
    });

    if (error) {
      logger.error('Migration failed', { err: error });
      process.exitCode = 1;
      return;
    }

    logger.info('Migrations up to date');
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('Migration crashed', { err });
  process.exit(1);
});
