/**
 * backend/src/app/routes.ts
 *
 * Route table: /health plus every module, in the order they appear in the API docs.
 * Wiring only; handlers live in each module's controller.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

type RouteModule = { registerRoutes(app: FastifyInstance): void };

function modulesOf(deps: AppDeps): RouteModule[] {
  return [
    deps.auth,
    deps.users,
    deps.organizations,
    deps.businessUnits,
    deps.projects,
    deps.projectModules,
  ];
}

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  const { nodeEnv, serviceName } = opts.config;

  app.get('/health', (req) => ({
    ok: true,
    env: nodeEnv,
    service: serviceName,
    requestId: req.requestContext.requestId,
  }));

  for (const mod of modulesOf(opts.deps)) mod.registerRoutes(app);
}
