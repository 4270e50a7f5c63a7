/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the user endpoints.
 * - Validates request payloads and shapes the response JSON.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  createUserSchema,
  listUsersQuerySchema,
  updateUserSchema,
  userIdParamsSchema,
} from './user.schemas';
import { AppError } from '../../shared/http/errors';
import { UserErrors } from './user.errors';
import type { UserService } from './user.service';
import type { UpdateUserInput, User, UserRole } from './user.types';

export type UserResponse = {
  id: number;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: UserRole;
  active: boolean;
  created_at: string;
  updated_at: string;
};

export type UserListResponse = {
  users: UserResponse[];
  total: number;
  page: number;
  size: number;
  pages: number;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    role: user.role,
    active: user.active,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

function parseUserId(req: FastifyRequest): number {
  const parsed = userIdParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw UserErrors.invalidUserId({ issues: parsed.error.issues });
  }
  return parsed.data.userId;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.createUser({
      username: parsed.data.username,
      email: parsed.data.email,
      firstName: parsed.data.first_name,
      lastName: parsed.data.last_name,
      role: parsed.data.role,
      active: parsed.data.active,
    });

    return reply.status(201).send(toUserResponse(user));
  }

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const parsed = listUsersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.userService.listUsers({
      page: parsed.data.page,
      size: parsed.data.size,
      activeOnly: parsed.data.active_only,
    });

    const body: UserListResponse = {
      users: result.users.map(toUserResponse),
      total: result.total,
      page: result.page,
      size: result.size,
      pages: result.pages,
    };

    return reply.status(200).send(body);
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.userService.getUser(parseUserId(req));
    return reply.status(200).send(toUserResponse(user));
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const userId = parseUserId(req);

    const parsed = updateUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { first_name, last_name, ...rest } = parsed.data;
    const input: UpdateUserInput = { ...rest };
    if (first_name !== undefined) input.firstName = first_name;
    if (last_name !== undefined) input.lastName = last_name;

    const user = await this.userService.updateUser(userId, input);
    return reply.status(200).send(toUserResponse(user));
  }

  async softDeleteUser(req: FastifyRequest, reply: FastifyReply) {
    await this.userService.softDeleteUser(parseUserId(req));
    return reply.status(204).send();
  }

  async hardDeleteUser(req: FastifyRequest, reply: FastifyReply) {
    await this.userService.hardDeleteUser(parseUserId(req));
    return reply.status(204).send();
  }
}
