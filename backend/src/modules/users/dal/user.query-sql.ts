/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.row';

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUserByUsernameSql(
  db: DbExecutor,
  username: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('username', '=', username).executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectUsersNewestFirstSql(
  db: DbExecutor,
  params: { activeOnly: boolean },
): Promise<UserRow[]> {
  let query = db.selectFrom('users').selectAll();

  if (params.activeOnly) {
    query = query.where('active', '=', true);
  }

  return query.orderBy('created_at', 'desc').execute();
}
