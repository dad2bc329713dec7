/**
 * backend/src/modules/projects/project.module.ts
 *
 * WHY:
 * - Encapsulates Projects module wiring.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { OrganizationRepo } from '../organizations';

import { ProjectRepo } from './dal/project.repo';
import { ProjectController } from './project.controller';
import { registerProjectRoutes } from './project.routes';
import { ProjectService } from './project.service';

export type ProjectModule = ReturnType<typeof createProjectModule>;

export function createProjectModule(deps: {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;
  authGuard: AuthGuard;
  organizationRepo: OrganizationRepo;
}) {
  const projectRepo = new ProjectRepo(deps.store);

  const projectService = new ProjectService({
    store: deps.store,
    logger: deps.logger,
    clock: deps.clock,
    projectRepo,
    organizationRepo: deps.organizationRepo,
  });

  const controller = new ProjectController(projectService);

  return {
    projectService,
    projectRepo,
    registerRoutes(app: FastifyInstance) {
      registerProjectRoutes(app, controller, deps.authGuard);
    },
  };
}
