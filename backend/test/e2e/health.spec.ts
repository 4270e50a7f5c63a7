import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  status: z.literal('healthy'),
  version: z.string(),
  environment: z.string(),
  requestId: z.string(),
});

type HealthResponse = z.infer<typeof HealthResponseSchema>;

describe('GET /health', () => {
  it('returns a healthy payload with the request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'req-123' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['x-request-id']).toBe('req-123');

      const parsed: HealthResponse = HealthResponseSchema.parse(res.json());

      expect(parsed.version).toBe('1.0.0');
      expect(parsed.environment).toBe('test');
      expect(parsed.requestId).toBe('req-123');
    } finally {
      await close();
    }
  });

  it('generates a request id when none is sent', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      const parsed = HealthResponseSchema.parse(res.json());
      expect(parsed.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(res.headers['x-request-id']).toBe(parsed.requestId);
    } finally {
      await close();
    }
  });
});

describe('GET /', () => {
  it('describes the service', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        message: 'user-admin-api',
        version: '1.0.0',
        status: 'healthy',
        environment: 'test',
      });
    } finally {
      await close();
    }
  });
});

describe('unknown routes', () => {
  it('answer 404 in the error body shape', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
    } finally {
      await close();
    }
  });
});
