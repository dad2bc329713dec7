/**
 * backend/src/modules/project-modules/project-module.module.ts
 *
 * WHY:
 * - Encapsulates Project Modules wiring. Receives the projects repo so module
 *   writes can keep project.modules in sync.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { ProjectRepo } from '../projects';

import { ProjectModuleRepo } from './dal/project-module.repo';
import { ProjectModuleController } from './project-module.controller';
import { registerProjectModuleRoutes } from './project-module.routes';
import { ProjectModuleService } from './project-module.service';

export type ProjectModuleModule = ReturnType<typeof createProjectModuleModule>;

export function createProjectModuleModule(deps: {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;
  authGuard: AuthGuard;
  projectRepo: ProjectRepo;
}) {
  const projectModuleRepo = new ProjectModuleRepo(deps.store);

  const projectModuleService = new ProjectModuleService({
    store: deps.store,
    logger: deps.logger,
    clock: deps.clock,
    projectModuleRepo,
    projectRepo: deps.projectRepo,
  });

  const controller = new ProjectModuleController(projectModuleService);

  return {
    projectModuleService,
    registerRoutes(app: FastifyInstance) {
      registerProjectModuleRoutes(app, controller, deps.authGuard);
    },
  };
}
