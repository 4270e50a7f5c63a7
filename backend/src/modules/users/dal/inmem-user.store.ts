/**
 * backend/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - Lets tests (and local dev with STORAGE_DRIVER=memory) run without Postgres.
 * - Mirrors the Postgres behaviour the service relies on:
 *   - serial ids
 *   - unique username/email (error code 23505 + constraint name)
 *   - all-or-nothing transactions
 *
 * RULES:
 * - Implements UserStore only; no extra methods visible to services.
 * - Transactions run one at a time; a rejected callback restores the
 *   snapshot taken when it started.
 * - Records (and their Date fields) are copied on the way in and out;
 *   callers never hold a reference into stored state.
 */

import { PG_UNIQUE_VIOLATION } from '../../../shared/db/pg-errors';
import { USER_CONSTRAINTS } from '../user.store';
import type { UserStore, UserStoreTx } from '../user.store';
import type { NewUser, UserChanges, UserRecord } from '../user.types';

export class InMemUniqueViolationError extends Error {
  readonly code = PG_UNIQUE_VIOLATION;

  constructor(
    readonly constraint: string,
    readonly detail: string,
  ) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
    this.name = 'InMemUniqueViolationError';
  }
}

type State = {
  rows: Map<number, UserRecord>;
  nextId: number;
};

function copyDate(date: Date | null): Date | null {
  return date === null ? null : new Date(date.getTime());
}

function copy(record: UserRecord): UserRecord {
  return { ...record, createdAt: copyDate(record.createdAt), updatedAt: copyDate(record.updatedAt) };
}

function snapshot(state: State): State {
  return {
    rows: new Map([...state.rows].map(([id, row]) => [id, copy(row)])),
    nextId: state.nextId,
  };
}

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

function applyChanges(current: UserRecord, changes: UserChanges): UserRecord {
  return {
    id: current.id,
    username: pick(changes.username, current.username),
    email: pick(changes.email, current.email),
    firstName: pick(changes.firstName, current.firstName),
    lastName: pick(changes.lastName, current.lastName),
    role: pick(changes.role, current.role),
    active: pick(changes.active, current.active),
    createdAt: pick(changes.createdAt, current.createdAt),
    updatedAt: pick(changes.updatedAt, current.updatedAt),
  };
}

function timeOf(date: Date | null): number {
  return date === null ? Number.NEGATIVE_INFINITY : date.getTime();
}

class InMemUserTx implements UserStoreTx {
  constructor(private readonly state: State) {}

  private findBy(predicate: (row: UserRecord) => boolean): UserRecord | undefined {
    for (const row of this.state.rows.values()) {
      if (predicate(row)) return copy(row);
    }
    return undefined;
  }

  private assertUnique(candidate: UserRecord): void {
    for (const row of this.state.rows.values()) {
      if (row.id === candidate.id) continue;

      if (row.username === candidate.username) {
        throw new InMemUniqueViolationError(
          USER_CONSTRAINTS.username,
          `Key (username)=(${candidate.username}) already exists.`,
        );
      }
      if (row.email === candidate.email) {
        throw new InMemUniqueViolationError(
          USER_CONSTRAINTS.email,
          `Key (email)=(${candidate.email}) already exists.`,
        );
      }
    }
  }

  findUserById(id: number): Promise<UserRecord | undefined> {
    const row = this.state.rows.get(id);
    return Promise.resolve(row ? copy(row) : undefined);
  }

  findUserByUsername(username: string): Promise<UserRecord | undefined> {
    return Promise.resolve(this.findBy((row) => row.username === username));
  }

  findUserByEmail(email: string): Promise<UserRecord | undefined> {
    return Promise.resolve(this.findBy((row) => row.email === email));
  }

  listUsersNewestFirst(filter: { activeOnly: boolean }): Promise<UserRecord[]> {
    // Postgres sorts NULLs first under DESC; keep the same order here.
    const rows = [...this.state.rows.values()]
      .filter((row) => !filter.activeOnly || row.active)
      .sort((a, b) => {
        const aNull = a.createdAt === null;
        const bNull = b.createdAt === null;
        if (aNull !== bNull) return aNull ? -1 : 1;
        return timeOf(b.createdAt) - timeOf(a.createdAt);
      })
      .map(copy);

    return Promise.resolve(rows);
  }

  backfillTimestamps(now: Date): Promise<number> {
    let filled = 0;

    for (const row of this.state.rows.values()) {
      if (row.createdAt === null) {
        row.createdAt = copyDate(now);
        filled += 1;
      }
      if (row.updatedAt === null) {
        row.updatedAt = copyDate(now);
        filled += 1;
      }
    }

    return Promise.resolve(filled);
  }

  insertUser(values: NewUser): Promise<UserRecord> {
    const row = copy({ ...values, id: this.state.nextId });

    this.assertUnique(row);

    this.state.nextId += 1;
    this.state.rows.set(row.id, row);

    return Promise.resolve(copy(row));
  }

  updateUser(id: number, changes: UserChanges): Promise<UserRecord | undefined> {
    const current = this.state.rows.get(id);
    if (!current) return Promise.resolve(undefined);

    const next = copy(applyChanges(current, changes));
    this.assertUnique(next);

    this.state.rows.set(id, next);
    return Promise.resolve(copy(next));
  }

  deleteUser(id: number): Promise<boolean> {
    return Promise.resolve(this.state.rows.delete(id));
  }
}

export class InMemUserStore implements UserStore {
  private state: State = { rows: new Map(), nextId: 1 };
  private tail: Promise<unknown> = Promise.resolve();

  transaction<T>(fn: (tx: UserStoreTx) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(fn));
    // The chain only orders transactions; callers still receive the rejection via `run`.
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async runIsolated<T>(fn: (tx: UserStoreTx) => Promise<T>): Promise<T> {
    const before = snapshot(this.state);

    try {
      return await fn(new InMemUserTx(this.state));
    } catch (err) {
      this.state = before;
      throw err;
    }
  }
}
