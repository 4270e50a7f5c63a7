/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Owns every business rule of the user lifecycle:
 *   uniqueness, pagination, timestamp repair, soft/hard delete.
 * - Only place allowed to start transactions (one per operation).
 *
 * RULES:
 * - No raw DB access; everything goes through UserStoreTx.
 * - Username/email pre-checks are a fast path only. The DB constraint is the
 *   source of truth; a violation that slips past the pre-check is mapped to
 *   the same Conflict outcome after the transaction rolls back.
 * - Any user returned to a caller has both timestamps; legacy rows are
 *   repaired inside the same transaction before they are returned.
 * - No retries. Any other storage failure propagates unchanged.
 * - Pass `now` for deterministic tests.
 */

import type { Logger } from '../../shared/logger/logger';
import { asUniqueViolation } from '../../shared/db/pg-errors';

import type { UserStore, UserStoreTx } from './user.store';
import type {
  CreateUserInput,
  UpdateUserInput,
  User,
  UserChanges,
  UserId,
  UserListPage,
  UserRecord,
  UserSlice,
} from './user.types';
import { UserErrors } from './user.errors';
import { classifyUniqueViolation } from './policies/user-conflict.policy';
import {
  assertValidPage,
  assertValidSlice,
  countPages,
  pageToSlice,
  slicePage,
} from './policies/user-pagination.policy';
import { assertValidUserId, timestampRepair, withTimestamps } from './policies/user-record.policy';

export type ListUsersParams = {
  page: number;
  size: number;
  activeOnly: boolean;
};

export type ListSliceParams = {
  skip: number;
  limit: number;
  activeOnly: boolean;
};

export class UserService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      store: UserStore;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async createUser(input: CreateUserInput): Promise<User> {
    const now = this.now();

    const user = await this.mapUniqueViolations('users.create', () =>
      this.deps.store.transaction(async (tx) => {
        if (await tx.findUserByUsername(input.username)) {
          throw UserErrors.conflict('username', { source: 'precheck' });
        }
        if (await tx.findUserByEmail(input.email)) {
          throw UserErrors.conflict('email', { source: 'precheck' });
        }

        const created = await tx.insertUser({
          username: input.username,
          email: input.email,
          firstName: input.firstName,
          lastName: input.lastName,
          role: input.role ?? 'user',
          active: input.active ?? true,
          createdAt: now,
          updatedAt: now,
        });

        return this.ensureTimestamps(tx, created, now);
      }),
    );

    this.deps.logger.info('users.create.success', {
      flow: 'users.create',
      userId: user.id,
      username: user.username,
    });

    return user;
  }

  async getUser(userId: UserId): Promise<User> {
    assertValidUserId(userId);
    const now = this.now();

    return this.deps.store.transaction(async (tx) => {
      const record = await tx.findUserById(userId);
      if (!record) {
        throw UserErrors.userNotFound({ userId });
      }

      return this.ensureTimestamps(tx, record, now);
    });
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const now = this.now();

    return this.deps.store.transaction(async (tx) => {
      const record = await tx.findUserByUsername(username);
      return record ? this.ensureTimestamps(tx, record, now) : undefined;
    });
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const now = this.now();

    return this.deps.store.transaction(async (tx) => {
      const record = await tx.findUserByEmail(email);
      return record ? this.ensureTimestamps(tx, record, now) : undefined;
    });
  }

  /**
   * Newest-first slice of the filtered users.
   * Fetches every matching row and slices in memory, so `total` counts the
   * whole filtered set. Users sharing a created_at come back in no fixed order.
   */
  async list(params: ListSliceParams): Promise<UserSlice> {
    assertValidSlice(params.skip, params.limit);
    const now = this.now();

    const slice = await this.deps.store.transaction(async (tx) => {
      const filled = await tx.backfillTimestamps(now);
      if (filled > 0) {
        this.deps.logger.warn('users.timestamps.backfilled', { flow: 'users.list', filled });
      }

      const rows = await tx.listUsersNewestFirst({ activeOnly: params.activeOnly });

      const users: User[] = [];
      for (const row of slicePage(rows, params.skip, params.limit)) {
        users.push(await this.ensureTimestamps(tx, row, now));
      }

      return { users, total: rows.length };
    });

    this.deps.logger.info('users.list.success', {
      flow: 'users.list',
      returned: slice.users.length,
      total: slice.total,
      activeOnly: params.activeOnly,
    });

    return slice;
  }

  async listUsers(params: ListUsersParams): Promise<UserListPage> {
    assertValidPage(params.page, params.size);

    const { skip, limit } = pageToSlice(params.page, params.size);
    const { users, total } = await this.list({ skip, limit, activeOnly: params.activeOnly });

    return {
      users,
      total,
      page: params.page,
      size: params.size,
      pages: countPages(total, params.size),
    };
  }

  async updateUser(userId: UserId, input: UpdateUserInput): Promise<User> {
    assertValidUserId(userId);
    const now = this.now();

    const user = await this.mapUniqueViolations('users.update', () =>
      this.deps.store.transaction(async (tx) => {
        const existing = await tx.findUserById(userId);
        if (!existing) {
          throw UserErrors.userNotFound({ userId });
        }

        await this.assertUsernameFree(tx, existing, input.username);
        await this.assertEmailFree(tx, existing, input.email);

        const changes: UserChanges = {
          ...input,
          ...timestampRepair(existing, now),
          updatedAt: now,
        };

        const updated = await tx.updateUser(userId, changes);
        if (!updated) {
          throw UserErrors.userNotFound({ userId });
        }

        return this.ensureTimestamps(tx, updated, now);
      }),
    );

    this.deps.logger.info('users.update.success', {
      flow: 'users.update',
      userId,
      fields: Object.keys(input),
    });

    return user;
  }

  /** Marks the user inactive; the row stays and is still readable by id. */
  async softDeleteUser(userId: UserId): Promise<void> {
    assertValidUserId(userId);
    const now = this.now();

    await this.deps.store.transaction(async (tx) => {
      const existing = await tx.findUserById(userId);
      if (!existing) {
        throw UserErrors.userNotFound({ userId });
      }

      const updated = await tx.updateUser(userId, {
        ...timestampRepair(existing, now),
        active: false,
        updatedAt: now,
      });
      // Gone between load and write (e.g. a concurrent hard delete).
      if (!updated) {
        throw UserErrors.userNotFound({ userId });
      }
    });

    this.deps.logger.info('users.soft_delete.success', { flow: 'users.soft_delete', userId });
  }

  /** Irreversible. */
  async hardDeleteUser(userId: UserId): Promise<void> {
    assertValidUserId(userId);

    await this.deps.store.transaction(async (tx) => {
      const existing = await tx.findUserById(userId);
      if (!existing) {
        throw UserErrors.userNotFound({ userId });
      }

      await tx.deleteUser(userId);
    });

    this.deps.logger.info('users.hard_delete.success', { flow: 'users.hard_delete', userId });
  }

  private async assertUsernameFree(
    tx: UserStoreTx,
    existing: UserRecord,
    username: string | undefined,
  ): Promise<void> {
    if (username === undefined || username === existing.username) return;

    const holder = await tx.findUserByUsername(username);
    if (holder && holder.id !== existing.id) {
      throw UserErrors.conflict('username', { source: 'precheck', userId: existing.id });
    }
  }

  private async assertEmailFree(
    tx: UserStoreTx,
    existing: UserRecord,
    email: string | undefined,
  ): Promise<void> {
    if (email === undefined || email === existing.email) return;

    const holder = await tx.findUserByEmail(email);
    if (holder && holder.id !== existing.id) {
      throw UserErrors.conflict('email', { source: 'precheck', userId: existing.id });
    }
  }

  /** Lazy repair for rows written before timestamps existed. */
  private async ensureTimestamps(tx: UserStoreTx, record: UserRecord, now: Date): Promise<User> {
    const ready = withTimestamps(record);
    if (ready) return ready;

    const repaired = await tx.updateUser(record.id, timestampRepair(record, now));
    const user = repaired ? withTimestamps(repaired) : undefined;
    if (!user) {
      throw UserErrors.timestampRepairFailed({ userId: record.id });
    }

    this.deps.logger.warn('users.timestamps.repaired', {
      flow: 'users.timestamps',
      userId: record.id,
    });

    return user;
  }

  /**
   * Runs a write transaction and turns a storage unique violation into a
   * Conflict. The transaction has already rolled back when we get here.
   */
  private async mapUniqueViolations<T>(flow: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      const violation = asUniqueViolation(err);
      if (!violation) throw err;

      const field = classifyUniqueViolation(violation);

      this.deps.logger.warn('users.unique_violation', {
        flow,
        field,
        constraint: violation.constraint,
      });

      throw UserErrors.conflict(field, { source: 'storage', constraint: violation.constraint });
    }
  }
}
