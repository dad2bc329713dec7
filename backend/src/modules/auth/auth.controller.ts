/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for all /auth endpoints.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - A failed Result from a flow is thrown here (unwrapOrThrow) and rendered by the
 *   global error handler.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendNoContent, sendSuccess } from '../../shared/http/envelope';
import { requirePrincipal } from '../../shared/http/require-auth-context';
import { toValidationError } from '../../shared/http/validation';
import { unwrapOrThrow } from '../../shared/result/result';

import { registerUserSchema } from '../users';

import { loginSchema, refreshSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return sendSuccess(reply, 200, 'Login successful', unwrapOrThrow(result));
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const result = await this.authService.logout({
      principal: requirePrincipal(req),
      requestId: req.requestContext.requestId,
    });

    unwrapOrThrow(result);
    return sendNoContent(reply);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const parsed = refreshSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const result = await this.authService.refresh({
      principal: requirePrincipal(req),
      refreshToken: parsed.data.refresh_token,
      requestId: req.requestContext.requestId,
    });

    return sendSuccess(reply, 200, 'Token refreshed successfully', unwrapOrThrow(result));
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.authService.me({
      principal: requirePrincipal(req),
      requestId: req.requestContext.requestId,
    });
    return sendSuccess(reply, 200, 'User retrieved successfully', user);
  }

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const user = await this.authService.register({
      input: parsed.data,
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
      requestId: req.requestContext.requestId,
    });
    return sendSuccess(reply, 201, 'User registered successfully', user);
  }
}
