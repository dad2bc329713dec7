/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Public self-service sign-up. Same validation, uniqueness and document defaults
 *   as admin user creation (modules/_shared/use-cases/provision-user.usecase.ts).
 *
 * RULES:
 * - The new user has no organization; an admin assigns one later. Until then login
 *   answers NO_ORGANIZATION.
 * - Only the self-service fields of RegisterUserInput reach the document.
 */

import type { DocumentStore } from '../../../../shared/store/document-store';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';

import { provisionUser } from '../../../_shared/use-cases/provision-user.usecase';
import { toPublicUser, type PublicUser, type RegisterUserInput, type UserRepo } from '../../../users';
import { emailDomain } from '../../helpers/email-domain';

const FLOW = 'auth.register';

export type RegisterParams = {
  input: RegisterUserInput;
  ip: string;
  userAgent: string | null;
  requestId: string;
};

export async function executeRegisterFlow(
  deps: {
    store: DocumentStore;
    userRepo: UserRepo;
    passwordHasher: PasswordHasher;
    logger: Logger;
    clock: Clock;
  },
  params: RegisterParams,
): Promise<PublicUser> {
  deps.logger.info({
    msg: 'auth.register.start',
    flow: FLOW,
    requestId: params.requestId,
    emailDomain: emailDomain(params.input.email ?? ''),
  });

  const user = await provisionUser({
    store: deps.store,
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    clock: deps.clock,
    input: {
      email: params.input.email,
      username: params.input.username,
      password: params.input.password,
      profile: params.input.profile,
      address: params.input.address,
      preferences: params.input.preferences,
      social_profiles: params.input.social_profiles,
    },
    orgId: null,
    registration: { source: 'web', ip: params.ip, userAgent: params.userAgent },
  });

  deps.logger.info({ msg: 'auth.register.success', flow: FLOW, requestId: params.requestId, userId: user.user_id });
  return toPublicUser(user);
}
