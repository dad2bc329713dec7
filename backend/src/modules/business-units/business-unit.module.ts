/**
 * backend/src/modules/business-units/business-unit.module.ts
 *
 * WHY:
 * - Encapsulates Business Units module wiring.
 * - Receives the organizations repo from DI so it can maintain org.business_units.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { OrganizationRepo } from '../organizations';

import { BusinessUnitRepo } from './dal/business-unit.repo';
import { BusinessUnitController } from './business-unit.controller';
import { registerBusinessUnitRoutes } from './business-unit.routes';
import { BusinessUnitService } from './business-unit.service';

export type BusinessUnitModule = ReturnType<typeof createBusinessUnitModule>;

export function createBusinessUnitModule(deps: {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;
  authGuard: AuthGuard;
  organizationRepo: OrganizationRepo;
}) {
  const businessUnitRepo = new BusinessUnitRepo(deps.store);

  const businessUnitService = new BusinessUnitService({
    store: deps.store,
    logger: deps.logger,
    clock: deps.clock,
    businessUnitRepo,
    organizationRepo: deps.organizationRepo,
  });

  const controller = new BusinessUnitController(businessUnitService);

  return {
    businessUnitService,
    registerRoutes(app: FastifyInstance) {
      registerBusinessUnitRoutes(app, controller, deps.authGuard);
    },
  };
}
