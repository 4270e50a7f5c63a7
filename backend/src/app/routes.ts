/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health)
 *   - module routes under the API prefix
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/', () => {
    return {
      message: opts.config.serviceName,
      version: opts.config.serviceVersion,
      status: 'healthy',
      environment: opts.config.nodeEnv,
    };
  });

  // Platform checks (does not touch the database)
  app.get('/health', (req) => {
    return {
      status: 'healthy',
      version: opts.config.serviceVersion,
      environment: opts.config.nodeEnv,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.users.registerRoutes(app, { prefix: opts.config.apiPrefix });
}
