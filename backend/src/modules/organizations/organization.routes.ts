/**
 * backend/src/modules/organizations/organization.routes.ts
 *
 * SECURITY:
 * - Every route requires a bearer token.
 * - Writes require the admin role.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import { requireAdmin } from '../../shared/http/access-guards';
import type { OrganizationController } from './organization.controller';

export function registerOrganizationRoutes(
  app: FastifyInstance,
  controller: OrganizationController,
  guard: AuthGuard,
) {
  const read = { preHandler: [guard.authenticate] };
  const write = { preHandler: [guard.authenticate, requireAdmin()] };

  app.get('/organizations', read, controller.list.bind(controller));
  app.post('/organizations', write, controller.create.bind(controller));
  app.get('/organizations/:orgId', read, controller.get.bind(controller));
  app.put('/organizations/:orgId', write, controller.update.bind(controller));
  app.delete('/organizations/:orgId', write, controller.remove.bind(controller));
  app.get('/organizations/:orgId/units', read, controller.units.bind(controller));
}
