/**
 * backend/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Production UserStore: Postgres through Kysely.
 * - Each service call gets one pooled connection inside one transaction;
 *   Kysely releases it on every exit path.
 *
 * RULES:
 * - Reads go through user.query-sql, writes through UserRepo (bound to trx).
 * - No AppError; pg errors (e.g. 23505) propagate to the service.
 */

import type { Db, DbExecutor } from '../../../shared/db/db';
import type { UserStore, UserStoreTx } from '../user.store';
import type { NewUser, UserChanges, UserRecord } from '../user.types';
import {
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserByUsernameSql,
  selectUsersNewestFirstSql,
} from './user.query-sql';
import { UserRepo } from './user.repo';
import { toUserRecord } from './user.row';
import type { UserRow } from './user.row';

function toRecordOrUndefined(row: UserRow | undefined): UserRecord | undefined {
  return row ? toUserRecord(row) : undefined;
}

class KyselyUserTx implements UserStoreTx {
  constructor(
    private readonly db: DbExecutor,
    private readonly userRepo: UserRepo,
  ) {}

  async findUserById(id: number): Promise<UserRecord | undefined> {
    return toRecordOrUndefined(await selectUserByIdSql(this.db, id));
  }

  async findUserByUsername(username: string): Promise<UserRecord | undefined> {
    return toRecordOrUndefined(await selectUserByUsernameSql(this.db, username));
  }

  async findUserByEmail(email: string): Promise<UserRecord | undefined> {
    return toRecordOrUndefined(await selectUserByEmailSql(this.db, email));
  }

  async listUsersNewestFirst(filter: { activeOnly: boolean }): Promise<UserRecord[]> {
    const rows = await selectUsersNewestFirstSql(this.db, filter);
    return rows.map(toUserRecord);
  }

  backfillTimestamps(now: Date): Promise<number> {
    return this.userRepo.backfillTimestamps(now);
  }

  insertUser(values: NewUser): Promise<UserRecord> {
    return this.userRepo.insertUser(values);
  }

  updateUser(id: number, changes: UserChanges): Promise<UserRecord | undefined> {
    return this.userRepo.updateUser(id, changes);
  }

  deleteUser(id: number): Promise<boolean> {
    return this.userRepo.deleteUser(id);
  }
}

export class KyselyUserStore implements UserStore {
  constructor(
    private readonly db: Db,
    private readonly userRepo: UserRepo = new UserRepo(db),
  ) {}

  transaction<T>(fn: (tx: UserStoreTx) => Promise<T>): Promise<T> {
    return this.db
      .transaction()
      .execute((trx) => fn(new KyselyUserTx(trx, this.userRepo.withDb(trx))));
  }
}
