/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (document store, hasher, token codec) and shares them.
 * - Keeps modules testable: tests pass their own store or clock through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (store driver, bcrypt cost) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import type { DocumentStore } from '../shared/store/document-store';
import { InMemDocumentStore } from '../shared/store/inmem-document-store';
import { PgDocumentStore } from '../shared/store/pg-document-store';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { TokenCodec } from '../shared/security/token-codec';
import { JwtTokenCodec } from '../shared/security/jwt-token-codec';

import type { AuthGuard } from '../shared/http/auth-guard';
import { createAuthGuard } from '../shared/http/auth-guard';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';
import { systemClock, type Clock } from '../shared/time/clock';

import { createOrganizationModule, type OrganizationModule } from '../modules/organizations/organization.module';
import { createBusinessUnitModule, type BusinessUnitModule } from '../modules/business-units/business-unit.module';
import { createProjectModule, type ProjectModule } from '../modules/projects/project.module';
import {
  createProjectModuleModule,
  type ProjectModuleModule,
} from '../modules/project-modules/project-module.module';
import { createUserModule, type UserModule } from '../modules/users/user.module';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  store: DocumentStore;
  logger: Logger;
  clock: Clock;

  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  authGuard: AuthGuard;

  // modules
  organizations: OrganizationModule;
  businessUnits: BusinessUnitModule;
  projects: ProjectModule;
  projectModules: ProjectModuleModule;
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  store?: DocumentStore;
  clock?: Clock;
};

function createStore(config: AppConfig): DocumentStore {
  if (config.storeDriver === 'memory') return new InMemDocumentStore();

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
  }
  return new PgDocumentStore(createDb(config.databaseUrl));
}

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const store = overrides.store ?? createStore(config);
  const clock = overrides.clock ?? systemClock;

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({ cost: config.bcryptCost });
  const tokenCodec: TokenCodec = new JwtTokenCodec({ ...config.jwt, now: clock });
  const authGuard = createAuthGuard({ tokenCodec });

  // modules (no HTTP / no business logic here)
  const organizations = createOrganizationModule({ store, logger, clock, authGuard });
  const businessUnits = createBusinessUnitModule({
    store,
    logger,
    clock,
    authGuard,
    organizationRepo: organizations.organizationRepo,
  });
  const projects = createProjectModule({
    store,
    logger,
    clock,
    authGuard,
    organizationRepo: organizations.organizationRepo,
  });
  const projectModules = createProjectModuleModule({
    store,
    logger,
    clock,
    authGuard,
    projectRepo: projects.projectRepo,
  });
  const users = createUserModule({ store, logger, clock, passwordHasher, authGuard });

  const auth = createAuthModule({
    store,
    userRepo: users.userRepo,
    passwordHasher,
    tokenCodec,
    authGuard,
    logger,
    clock,
  });

  return {
    store,
    logger,
    clock,
    passwordHasher,
    tokenCodec,
    authGuard,
    organizations,
    businessUnits,
    projects,
    projectModules,
    users,
    auth,
    close: () => store.close(),
  };
}
