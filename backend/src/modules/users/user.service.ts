/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Admin user management under /users.
 *
 * RULES:
 * - Every operation resolves the caller's organization first.
 * - Responses are always PublicUser (no password hash, no recovery codes).
 * - The password hash is never patchable: updateUserSchema has no password field and
 *   the security section only carries the verification / MFA flags.
 */

import type { DocumentStore } from '../../shared/store/document-store';
import { parseDocuments } from '../../shared/store/parse-document';
import { FieldPatchBuilder } from '../../shared/patch/field-patch-builder';
import { buildPagination, type PageRequest, type PaginationBlock } from '../../shared/http/pagination';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import type { Actor } from '../_shared/actor';
import { provisionUser } from '../_shared/use-cases/provision-user.usecase';
import { resolveCallerOrganization } from '../_shared/use-cases/resolve-caller-organization.usecase';
import { toOrganizationRef, type OrganizationRef } from '../organizations';

import type { UserRepo } from './dal/user.repo';
import {
  getUserById,
  isEmailTakenByOther,
  isUsernameTakenByOther,
  listUsers,
  parseUserDocument,
} from './queries/user.queries';
import { UserErrors } from './user.errors';
import type { CreateUserInput, UpdateUserInput } from './user.schemas';
import { toPublicUser, userDocumentSchema, type PublicUser } from './user.types';

export type UserList = {
  users: PublicUser[];
  pagination: PaginationBlock;
  organization: OrganizationRef;
};

export type ClientInfo = Readonly<{ ip: string | null; userAgent: string | null }>;

export class UserService {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      logger: Logger;
      clock: Clock;
      passwordHasher: PasswordHasher;
      userRepo: UserRepo;
    },
  ) {}

  async listUsers(actor: Actor, page: PageRequest): Promise<UserList> {
    const flow = 'users.list';
    const organization = await this.resolveCaller(actor, flow);

    const { rows, total } = await listUsers(this.deps.store, page);
    const users = parseDocuments(userDocumentSchema, rows, 'user_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'users.list.invalid_record',
        flow,
        requestId: actor.requestId,
        userId: invalid.id,
        issues: invalid.issues,
      });
    });

    return {
      users: users.map(toPublicUser),
      pagination: buildPagination(page, users.length, total),
      organization: toOrganizationRef(organization),
    };
  }

  async getUser(actor: Actor, userId: string): Promise<PublicUser> {
    await this.resolveCaller(actor, 'users.get');
    return this.loadPublicUser(userId);
  }

  async createUser(actor: Actor, input: CreateUserInput, client: ClientInfo): Promise<PublicUser> {
    const flow = 'users.create';
    const organization = await this.resolveCaller(actor, flow);

    this.deps.logger.info({
      msg: 'users.create.start',
      flow,
      requestId: actor.requestId,
      createdBy: actor.principal.userId,
    });

    const user = await provisionUser({
      store: this.deps.store,
      userRepo: this.deps.userRepo,
      passwordHasher: this.deps.passwordHasher,
      clock: this.deps.clock,
      input,
      orgId: input.org_id ?? organization.org_id,
      registration: { source: 'admin', ip: client.ip, userAgent: client.userAgent },
    });

    this.deps.logger.info({
      msg: 'users.create.success',
      flow,
      requestId: actor.requestId,
      userId: user.user_id,
      orgId: user.org_id,
    });
    return toPublicUser(user);
  }

  async updateUser(actor: Actor, userId: string, input: UpdateUserInput): Promise<PublicUser> {
    const flow = 'users.update';
    await this.resolveCaller(actor, flow);

    const raw = await getUserById(this.deps.store, userId);
    if (!raw) throw UserErrors.userNotFound({ userId });

    if (input.email && (await isEmailTakenByOther(this.deps.store, input.email, userId))) {
      throw UserErrors.emailTakenByOther();
    }
    if (input.username && (await isUsernameTakenByOther(this.deps.store, input.username, userId))) {
      throw UserErrors.usernameTakenByOther();
    }

    const patch = new FieldPatchBuilder(raw, 'user')
      .field('email', input.email)
      .field('username', input.username)
      .nested('profile', input.profile)
      .nested('address', input.address)
      .nested('preferences', input.preferences)
      .nested('security', input.security)
      .field('org_id', input.org_id)
      .field('business_units', input.business_units)
      .nested('membership', input.membership)
      .field('social_profiles', input.social_profiles)
      .field('roles', input.roles)
      .field('groups', input.groups)
      .field('tags', input.tags)
      .field('metadata', input.metadata)
      .field('is_active', input.is_active)
      .field('is_banned', input.is_banned)
      .field('is_suspended', input.is_suspended)
      .build(this.deps.clock);
    if (!patch.ok) throw patch.error;

    const updated = await this.deps.userRepo.updateUser(userId, patch.value);
    if (!updated) throw UserErrors.userNotFound({ userId });

    this.deps.logger.info({
      msg: 'users.update.success',
      flow,
      requestId: actor.requestId,
      userId,
      updatedBy: actor.principal.userId,
      fields: Object.keys(patch.value),
    });
    return this.loadPublicUser(userId);
  }

  async deleteUser(actor: Actor, userId: string): Promise<void> {
    const flow = 'users.delete';
    await this.resolveCaller(actor, flow);

    const deleted = await this.deps.userRepo.deleteUser(userId);
    if (!deleted) throw UserErrors.userNotFound({ userId });

    this.deps.logger.info({
      msg: 'users.delete.success',
      flow,
      requestId: actor.requestId,
      userId,
      deletedBy: actor.principal.userId,
    });
  }

  private resolveCaller(actor: Actor, flow: string) {
    return resolveCallerOrganization(this.deps, { ...actor, flow });
  }

  private async loadPublicUser(userId: string): Promise<PublicUser> {
    const raw = await getUserById(this.deps.store, userId);
    if (!raw) throw UserErrors.userNotFound({ userId });

    const parsed = parseUserDocument(raw);
    if (!parsed.ok) {
      this.deps.logger.error({ msg: 'users.corrupt_record', userId, issues: parsed.error.issues });
      throw UserErrors.userDataFormatError({ userId });
    }
    return toPublicUser(parsed.value);
  }
}
