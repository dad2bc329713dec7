/**
 * backend/src/modules/users/user.routes.ts
 *
 * SECURITY:
 * - Bearer token on every route; writes require the admin role.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import { requireAdmin } from '../../shared/http/access-guards';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController, guard: AuthGuard) {
  const read = { preHandler: [guard.authenticate] };
  const write = { preHandler: [guard.authenticate, requireAdmin()] };

  app.get('/users', read, controller.list.bind(controller));
  app.post('/users', write, controller.create.bind(controller));
  app.get('/users/:userId', read, controller.get.bind(controller));
  app.put('/users/:userId', write, controller.update.bind(controller));
  app.delete('/users/:userId', write, controller.remove.bind(controller));
}
