/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point of the auth module: login, logout, refresh, me, register.
 * - Each use-case lives in its own flow under flows/; the service only carries deps.
 *
 * RULES:
 * - Token flows return Result; register and me throw AppError like the admin services.
 * - Never log raw passwords or tokens.
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { AppError } from '../../shared/http/errors';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Principal } from '../../shared/security/principal';
import type { TokenCodec } from '../../shared/security/token-codec';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { Result } from '../../shared/result/result';

import { toPublicUser, UserErrors, type PublicUser, type UserRepo } from '../users';

import type { LoginTokens, RefreshedAccess } from './auth.types';
import { loadUserRecord } from './helpers/load-user-record';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeLogoutFlow, type LogoutOutcome } from './flows/logout/execute-logout-flow';
import { executeRefreshFlow } from './flows/refresh/execute-refresh-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';

export type AuthServiceDeps = {
  store: DocumentStore;
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  logger: Logger;
  clock: Clock;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  login(params: LoginParams): Promise<Result<LoginTokens, AppError>> {
    return executeLoginFlow(this.deps, params);
  }

  logout(params: { principal: Principal; requestId: string }): Promise<Result<LogoutOutcome, AppError>> {
    return executeLogoutFlow(this.deps, params);
  }

  refresh(params: {
    principal: Principal;
    refreshToken: string;
    requestId: string;
  }): Promise<Result<RefreshedAccess, AppError>> {
    return executeRefreshFlow(this.deps, params);
  }

  register(params: RegisterParams): Promise<PublicUser> {
    return executeRegisterFlow(this.deps, params);
  }

  async me(params: { principal: Principal; requestId: string }): Promise<PublicUser> {
    const userId = params.principal.userId;
    const loaded = await loadUserRecord(
      this.deps,
      { by: 'id', userId },
      { flow: 'auth.me', requestId: params.requestId },
    );
    if (!loaded.ok) throw loaded.error;
    if (!loaded.value) throw UserErrors.userNotFound({ userId });

    return toPublicUser(loaded.value);
  }
}
