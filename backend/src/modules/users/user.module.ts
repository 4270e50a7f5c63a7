/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - DI creates infra (store); module composes service, controller, routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { UserStore } from './user.store';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { store: UserStore; logger: Logger; now?: () => Date }) {
  const userService = new UserService({
    store: deps.store,
    logger: deps.logger,
    now: deps.now,
  });

  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance, opts: { prefix: string }) {
      registerUserRoutes(app, controller, opts);
    },
  };
}
