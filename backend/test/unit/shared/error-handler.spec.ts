import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { AppError } from '../../../src/shared/http/errors';
import { redactMeta, registerErrorHandler } from '../../../src/shared/http/error-handler';
import { registerRequestContext } from '../../../src/shared/http/request-context';

function buildApp() {
  const app = Fastify({ logger: false });
  registerRequestContext(app);
  registerErrorHandler(app);

  app.get('/conflict', () => {
    throw AppError.conflict('Username already exists', { email: 'a@example.com' });
  });
  app.get('/boom', () => {
    throw new Error('db exploded at 10.0.0.1');
  });

  return app;
}

describe('registerErrorHandler', () => {
  it('maps AppError to its status and code without meta', async () => {
    const app = buildApp();

    const res = await app.inject({ method: 'GET', url: '/conflict' });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: { code: 'CONFLICT', message: 'Username already exists' } });
    await app.close();
  });

  it('hides unexpected errors behind a generic 500', async () => {
    const app = buildApp();

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });
    await app.close();
  });
});

describe('redactMeta', () => {
  it('masks sensitive keys and keeps the rest', () => {
    expect(redactMeta({ email: 'a@example.com', field: 'email', userId: 3 })).toEqual({
      email: '[REDACTED]',
      field: 'email',
      userId: 3,
    });
  });

  it('only masks keys that user errors can carry', () => {
    expect(redactMeta({ constraint: 'users_email_key', source: 'storage' })).toEqual({
      constraint: 'users_email_key',
      source: 'storage',
    });
  });

  it('passes non-objects through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('plain')).toBe('plain');
  });
});
