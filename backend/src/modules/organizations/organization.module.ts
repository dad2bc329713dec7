/**
 * backend/src/modules/organizations/organization.module.ts
 *
 * WHY:
 * - Encapsulates Organizations module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import { OrganizationRepo } from './dal/organization.repo';
import { OrganizationController } from './organization.controller';
import { registerOrganizationRoutes } from './organization.routes';
import { OrganizationService } from './organization.service';

export type OrganizationModule = ReturnType<typeof createOrganizationModule>;

export function createOrganizationModule(deps: {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;
  authGuard: AuthGuard;
}) {
  const organizationRepo = new OrganizationRepo(deps.store);

  const organizationService = new OrganizationService({
    store: deps.store,
    logger: deps.logger,
    clock: deps.clock,
    organizationRepo,
  });

  const controller = new OrganizationController(organizationService);

  return {
    organizationService,
    organizationRepo,
    registerRoutes(app: FastifyInstance) {
      registerOrganizationRoutes(app, controller, deps.authGuard);
    },
  };
}
