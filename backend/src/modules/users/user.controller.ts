/**
 * backend/src/modules/users/user.controller.ts
 *
 * RULES:
 * - No store access here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendNoContent, sendSuccess } from '../../shared/http/envelope';
import { parsePageRequest } from '../../shared/http/pagination';
import { toValidationError } from '../../shared/http/validation';
import { actorFromRequest } from '../_shared/actor';

import type { UserService } from './user.service';
import { createUserSchema, updateUserSchema, userIdParamsSchema } from './user.schemas';

function parseUserId(req: FastifyRequest): string {
  const parsed = userIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data.userId;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const user = await this.userService.createUser(actorFromRequest(req), parsed.data, {
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
    });
    return sendSuccess(reply, 201, 'User created successfully', user);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.userService.getUser(actorFromRequest(req), parseUserId(req));
    return sendSuccess(reply, 200, 'User retrieved successfully', user);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const userId = parseUserId(req);
    const parsed = updateUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const user = await this.userService.updateUser(actorFromRequest(req), userId, parsed.data);
    return sendSuccess(reply, 200, 'User updated successfully', user);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    await this.userService.deleteUser(actorFromRequest(req), parseUserId(req));
    return sendNoContent(reply);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const page = parsePageRequest(req.query);
    const result = await this.userService.listUsers(actorFromRequest(req), page);
    return sendSuccess(reply, 200, `Users retrieved successfully. Found ${result.users.length} users.`, result);
  }
}
