/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Unique violations are NOT caught here; they propagate as pg errors.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toInsertRow, toUpdateRow, toUserRecord } from './user.row';
import type { NewUser, UserChanges, UserRecord } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  async insertUser(user: NewUser): Promise<UserRecord> {
    const row = await this.db
      .insertInto('users')
      .values(toInsertRow(user))
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUserRecord(row);
  }

  /**
   * Applies only the keys present in `changes`.
   * Returns undefined when no row has this id.
   */
  async updateUser(userId: number, changes: UserChanges): Promise<UserRecord | undefined> {
    const row = await this.db
      .updateTable('users')
      .set(toUpdateRow(changes))
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();

    return row ? toUserRecord(row) : undefined;
  }

  async deleteUser(userId: number): Promise<boolean> {
    const res = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();

    return Number(res?.numDeletedRows ?? 0) > 0;
  }

  /**
   * Legacy rows: fills NULL created_at / updated_at with `now`.
   * Returns the number of column updates applied (a row missing both counts twice).
   */
  async backfillTimestamps(now: Date): Promise<number> {
    const created = await this.db
      .updateTable('users')
      .set({ created_at: now })
      .where('created_at', 'is', null)
      .executeTakeFirst();

    const updated = await this.db
      .updateTable('users')
      .set({ updated_at: now })
      .where('updated_at', 'is', null)
      .executeTakeFirst();

    return Number(created?.numUpdatedRows ?? 0) + Number(updated?.numUpdatedRows ?? 0);
  }
}
