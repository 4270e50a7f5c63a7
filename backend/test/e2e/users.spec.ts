import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { steppingClock } from '../helpers/clock';
import { legacyRow } from '../helpers/user-fixtures';
import type { UserListResponse, UserResponse } from '../../src/modules/users/user.controller';
import type { ErrorResponseBody } from '../../src/shared/http/error-handler';

/**
 * Flow: create -> read -> update -> soft delete -> hard delete over HTTP,
 * with a stepping clock so timestamps are exact.
 */

const USERS = '/api/v1/users';

function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

function body(name: string, overrides: Record<string, unknown> = {}) {
  return {
    username: name,
    email: `${name}@example.com`,
    first_name: 'Test',
    last_name: 'User',
    ...overrides,
  };
}

describe('POST /api/v1/users', () => {
  it('creates a user → 201 with the full user JSON', async () => {
    const { app, close } = await buildTestApp({ now: steppingClock() });

    try {
      const res = await app.inject({ method: 'POST', url: USERS, payload: body('alice') });

      expect(res.statusCode).toBe(201);
      expect(readJson<UserResponse>(res)).toEqual({
        id: 1,
        username: 'alice',
        email: 'alice@example.com',
        first_name: 'Test',
        last_name: 'User',
        role: 'user',
        active: true,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '2024-01-01T00:00:00.000Z',
      });
    } finally {
      await close();
    }
  });

  it('rejects a duplicate username → 409 CONFLICT', async () => {
    const { app, close } = await buildTestApp();

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });
      const res = await app.inject({
        method: 'POST',
        url: USERS,
        payload: body('alice', { email: 'second@example.com' }),
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'CONFLICT', message: 'Username already exists' },
      });
    } finally {
      await close();
    }
  });

  it('rejects a duplicate email → 409 CONFLICT', async () => {
    const { app, close } = await buildTestApp();

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });
      const res = await app.inject({
        method: 'POST',
        url: USERS,
        payload: body('bob', { email: 'alice@example.com' }),
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Email already exists');
    } finally {
      await close();
    }
  });

  it('rejects an invalid body → 400 VALIDATION_ERROR', async () => {
    const { app, close } = await buildTestApp();

    try {
      const cases = [
        body('ab'),
        body('alice', { email: 'not-an-email' }),
        body('alice', { role: 'owner' }),
        { username: 'alice' },
      ];

      for (const payload of cases) {
        const res = await app.inject({ method: 'POST', url: USERS, payload });
        expect(res.statusCode).toBe(400);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
        });
      }
    } finally {
      await close();
    }
  });

  it('rejects malformed JSON → 400 VALIDATION_ERROR', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: USERS,
        headers: { 'content-type': 'application/json' },
        payload: '{"username":',
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});

describe('GET /api/v1/users/:userId', () => {
  it('returns 400 for a malformed id and 404 for a missing one', async () => {
    const { app, close } = await buildTestApp();

    try {
      for (const id of ['abc', '0', '-4', '2147483648']) {
        const res = await app.inject({ method: 'GET', url: `${USERS}/${id}` });
        expect(res.statusCode).toBe(400);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          error: { code: 'VALIDATION_ERROR', message: 'Invalid user ID' },
        });
      }

      const missing = await app.inject({ method: 'GET', url: `${USERS}/999` });
      expect(missing.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(missing)).toEqual({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      });
    } finally {
      await close();
    }
  });

  it('repairs a legacy row before returning it', async () => {
    const { app, store, close } = await buildTestApp({ now: steppingClock() });

    try {
      const seeded = await store.transaction((tx) => tx.insertUser(legacyRow('old')));

      const res = await app.inject({ method: 'GET', url: `${USERS}/${seeded.id}` });

      expect(res.statusCode).toBe(200);
      const user = readJson<UserResponse>(res);
      expect(user.created_at).toBe('2024-01-01T00:00:00.000Z');
      expect(user.updated_at).toBe('2024-01-01T00:00:00.000Z');
    } finally {
      await close();
    }
  });
});

describe('PUT /api/v1/users/:userId', () => {
  it('applies a partial update', async () => {
    const { app, close } = await buildTestApp({ now: steppingClock() });

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });

      const res = await app.inject({
        method: 'PUT',
        url: `${USERS}/1`,
        payload: { first_name: 'Alicia', role: 'admin' },
      });

      expect(res.statusCode).toBe(200);
      const user = readJson<UserResponse>(res);
      expect(user.first_name).toBe('Alicia');
      expect(user.last_name).toBe('User');
      expect(user.role).toBe('admin');
      expect(user.created_at).toBe('2024-01-01T00:00:00.000Z');
      expect(user.updated_at).toBe('2024-01-01T00:00:01.000Z');
    } finally {
      await close();
    }
  });

  it('rejects another user\'s email → 409', async () => {
    const { app, close } = await buildTestApp();

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });
      await app.inject({ method: 'POST', url: USERS, payload: body('bob') });

      const res = await app.inject({
        method: 'PUT',
        url: `${USERS}/2`,
        payload: { email: 'alice@example.com' },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Email already exists');
    } finally {
      await close();
    }
  });

  it('returns 404 for a missing user and 400 for a bad field', async () => {
    const { app, close } = await buildTestApp();

    try {
      const missing = await app.inject({
        method: 'PUT',
        url: `${USERS}/7`,
        payload: { first_name: 'Ghost' },
      });
      expect(missing.statusCode).toBe(404);

      const bad = await app.inject({ method: 'PUT', url: `${USERS}/7`, payload: { active: 'yes' } });
      expect(bad.statusCode).toBe(400);
    } finally {
      await close();
    }
  });
});

describe('DELETE /api/v1/users/:userId', () => {
  it('soft deletes: 204, still readable, hidden from the default listing', async () => {
    const { app, close } = await buildTestApp();

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });
      await app.inject({ method: 'POST', url: USERS, payload: body('bob') });

      const del = await app.inject({ method: 'DELETE', url: `${USERS}/1` });
      expect(del.statusCode).toBe(204);
      expect(del.body).toBe('');

      const read = await app.inject({ method: 'GET', url: `${USERS}/1` });
      expect(readJson<UserResponse>(read).active).toBe(false);

      const active = readJson<UserListResponse>(await app.inject({ method: 'GET', url: USERS }));
      expect(active.users.map((u) => u.username)).toEqual(['bob']);

      const all = readJson<UserListResponse>(
        await app.inject({ method: 'GET', url: `${USERS}?active_only=false` }),
      );
      expect(all.total).toBe(2);
    } finally {
      await close();
    }
  });

  it('hard deletes: 204, then 404', async () => {
    const { app, close } = await buildTestApp();

    try {
      await app.inject({ method: 'POST', url: USERS, payload: body('alice') });

      const del = await app.inject({ method: 'DELETE', url: `${USERS}/1/hard` });
      expect(del.statusCode).toBe(204);

      const read = await app.inject({ method: 'GET', url: `${USERS}/1` });
      expect(read.statusCode).toBe(404);

      const again = await app.inject({ method: 'DELETE', url: `${USERS}/1/hard` });
      expect(again.statusCode).toBe(404);
    } finally {
      await close();
    }
  });
});

describe('GET /api/v1/users', () => {
  it('pages newest first with totals', async () => {
    const { app, close } = await buildTestApp({ now: steppingClock() });

    try {
      for (let i = 1; i <= 15; i++) {
        await app.inject({ method: 'POST', url: USERS, payload: body(`user${i}`) });
      }

      const res = await app.inject({ method: 'GET', url: `${USERS}?page=2&size=10` });

      expect(res.statusCode).toBe(200);
      const list = readJson<UserListResponse>(res);
      expect(list.total).toBe(15);
      expect(list.page).toBe(2);
      expect(list.size).toBe(10);
      expect(list.pages).toBe(2);
      expect(list.users.map((u) => u.username)).toEqual(['user5', 'user4', 'user3', 'user2', 'user1']);
    } finally {
      await close();
    }
  });

  it('uses defaults and ignores a trailing slash', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: `${USERS}/` });

      expect(res.statusCode).toBe(200);
      expect(readJson<UserListResponse>(res)).toEqual({
        users: [],
        total: 0,
        page: 1,
        size: 10,
        pages: 1,
      });
    } finally {
      await close();
    }
  });

  it('rejects out-of-range paging → 400', async () => {
    const { app, close } = await buildTestApp();

    try {
      for (const query of ['page=0', 'size=0', 'size=101', 'active_only=maybe']) {
        const res = await app.inject({ method: 'GET', url: `${USERS}?${query}` });
        expect(res.statusCode).toBe(400);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          error: { code: 'VALIDATION_ERROR', message: 'Invalid query' },
        });
      }
    } finally {
      await close();
    }
  });
});
