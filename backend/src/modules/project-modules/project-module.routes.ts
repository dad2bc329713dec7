/**
 * backend/src/modules/project-modules/project-module.routes.ts
 *
 * SECURITY:
 * - Same role rule as projects: writes need admin or manager.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import { requireRoles } from '../../shared/http/access-guards';
import type { ProjectModuleController } from './project-module.controller';

const BASE = '/projects/:projectId/modules';
const WRITE_ROLES = ['admin', 'manager'];

export function registerProjectModuleRoutes(
  app: FastifyInstance,
  controller: ProjectModuleController,
  guard: AuthGuard,
) {
  const read = { preHandler: [guard.authenticate] };
  const write = { preHandler: [guard.authenticate, requireRoles(WRITE_ROLES)] };

  app.get(BASE, read, controller.list.bind(controller));
  app.post(BASE, write, controller.create.bind(controller));
  app.get(`${BASE}/:moduleId`, read, controller.get.bind(controller));
  app.put(`${BASE}/:moduleId`, write, controller.update.bind(controller));
  app.delete(`${BASE}/:moduleId`, write, controller.remove.bind(controller));
}
