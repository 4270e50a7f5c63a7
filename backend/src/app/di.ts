/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Keeps modules testable: tests hand in their own UserStore / clock.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store backs users) belong HERE.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule, InMemUserStore, KyselyUserStore } from '../modules/users';
import type { UserModule, UserStore } from '../modules/users';

export type AppDeps = {
  db: Db | null;
  logger: Logger;
  userStore: UserStore;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  userStore?: UserStore;
  now?: () => Date;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const db = config.storage.driver === 'postgres' ? createDb(config.storage.databaseUrl) : null;

  const userStore: UserStore = overrides.userStore ?? (db ? new KyselyUserStore(db) : new InMemUserStore());

  if (!db && !overrides.userStore) {
    logger.warn('storage.memory', { note: 'users are kept in process memory and lost on restart' });
  }

  const users = createUserModule({ store: userStore, logger, now: overrides.now });

  return {
    db,
    logger,
    userStore,
    users,
    close: async () => {
      await db?.destroy();
    },
  };
}
