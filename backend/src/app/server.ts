/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are registered afterwards.
 *
 * RULES:
 * - Request context is registered first: every later hook (and the CORS
 *   preflight reply) can rely on req.requestContext.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(config: Pick<AppConfig, 'corsOrigins'>) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    ignoreTrailingSlash: true,
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  // CORS (browser frontends); origins that are not listed get no allow-origin header
  await app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    exposedHeaders: ['x-request-id'],
    maxAge: 86400,
  });

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('response', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
      requestId: req.requestContext.requestId,
    });
    done();
  });

  return app;
}
