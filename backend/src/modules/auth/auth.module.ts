/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { AuthGuard } from '../../shared/http/auth-guard';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { UserRepo } from '../users';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  store: DocumentStore;
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  authGuard: AuthGuard;
  logger: Logger;
  clock: Clock;
}) {
  const authService = new AuthService({
    store: deps.store,
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    tokenCodec: deps.tokenCodec,
    logger: deps.logger,
    clock: deps.clock,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller, deps.authGuard);
    },
  };
}
