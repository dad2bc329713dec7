/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes userRepo: the auth module reads and writes the same user documents
 *   (login bookkeeping, logout, register).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import { UserRepo } from './dal/user.repo';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;
  passwordHasher: PasswordHasher;
  authGuard: AuthGuard;
}) {
  const userRepo = new UserRepo(deps.store);

  const userService = new UserService({
    store: deps.store,
    logger: deps.logger,
    clock: deps.clock,
    passwordHasher: deps.passwordHasher,
    userRepo,
  });

  const controller = new UserController(userService);

  return {
    userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller, deps.authGuard);
    },
  };
}
