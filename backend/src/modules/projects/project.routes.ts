/**
 * backend/src/modules/projects/project.routes.ts
 *
 * SECURITY:
 * - Bearer token on every route; writes require admin or manager.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import { requireRoles } from '../../shared/http/access-guards';
import type { ProjectController } from './project.controller';

const WRITE_ROLES = ['admin', 'manager'];

export function registerProjectRoutes(app: FastifyInstance, controller: ProjectController, guard: AuthGuard) {
  const read = { preHandler: [guard.authenticate] };
  const write = { preHandler: [guard.authenticate, requireRoles(WRITE_ROLES)] };

  app.get('/projects', read, controller.list.bind(controller));
  app.post('/projects', write, controller.create.bind(controller));
  app.get('/projects/:projectId', read, controller.get.bind(controller));
  app.put('/projects/:projectId', write, controller.update.bind(controller));
  app.delete('/projects/:projectId', write, controller.remove.bind(controller));
}
