/**
 * backend/src/modules/business-units/business-unit.routes.ts
 *
 * SECURITY:
 * - Bearer token on every route; writes require the admin role.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../../shared/http/auth-guard';
import { requireAdmin } from '../../shared/http/access-guards';
import type { BusinessUnitController } from './business-unit.controller';

const BASE = '/organizations/:orgId/business-units';

export function registerBusinessUnitRoutes(
  app: FastifyInstance,
  controller: BusinessUnitController,
  guard: AuthGuard,
) {
  const read = { preHandler: [guard.authenticate] };
  const write = { preHandler: [guard.authenticate, requireAdmin()] };

  app.get(BASE, read, controller.list.bind(controller));
  app.post(BASE, write, controller.create.bind(controller));
  app.get(`${BASE}/:buId`, read, controller.get.bind(controller));
  app.put(`${BASE}/:buId`, write, controller.update.bind(controller));
  app.delete(`${BASE}/:buId`, write, controller.remove.bind(controller));
}
