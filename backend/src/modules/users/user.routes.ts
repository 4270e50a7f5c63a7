/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(
  app: FastifyInstance,
  controller: UserController,
  opts: { prefix: string },
) {
  const base = `${opts.prefix}/users`;

  app.post(base, controller.createUser.bind(controller));
  app.get(base, controller.listUsers.bind(controller));
  app.get(`${base}/:userId`, controller.getUser.bind(controller));
  app.put(`${base}/:userId`, controller.updateUser.bind(controller));
  app.delete(`${base}/:userId`, controller.softDeleteUser.bind(controller));
  app.delete(`${base}/:userId/hard`, controller.hardDeleteUser.bind(controller));
}
