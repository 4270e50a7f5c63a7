/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a stable requestId for logs and error traces.
 * - Callers may pass their own `x-request-id` (e.g. from a load balancer).
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const MAX_REQUEST_ID_LENGTH = 128;

export function resolveRequestId(rawHeader: unknown): string {
  if (typeof rawHeader !== 'string') return randomUUID();

  const trimmed = rawHeader.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) return randomUUID();

  return trimmed;
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the hook assigns the real value.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);

    req.requestContext = { requestId };
    reply.header('x-request-id', requestId);

    done();
  });
}
