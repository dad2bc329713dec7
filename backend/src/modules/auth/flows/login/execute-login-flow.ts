/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login is a fixed sequence of checks; every step returns a Result and the first
 *   failure ends the attempt. Only the controller turns the failure into an HTTP error.
 *
 * STEPS (order is part of the contract):
 *  1. email + password present             → MISSING_CREDENTIALS
 *  2. normalize email, check syntax        → INVALID_EMAIL_FORMAT
 *  3. load user by email                   → INVALID_CREDENTIALS (no email oracle)
 *  4. parse stored record                  → USER_DATA_FORMAT_ERROR (500)
 *  5. is_active / is_banned / is_suspended → ACCOUNT_INACTIVE / _BANNED / _SUSPENDED
 *  6. org_id present                       → NO_ORGANIZATION
 *  7. email verified                       → EMAIL_NOT_VERIFIED
 *  8. password hash stored                 → ACCOUNT_CONFIG_ERROR (500)
 *  9. verify password                      → INVALID_CREDENTIALS
 * 10. issue access + refresh tokens        → TOKEN_GENERATION_ERROR (500)
 * 11. bookkeeping write (best-effort)
 * 12. return the token pair
 *
 * RULES:
 * - No HTTP concerns here.
 * - The failure reason is logged; the client only sees the error code.
 * - Never log the password, its hash, or the tokens.
 */

import { z } from 'zod';

import type { DocumentStore } from '../../../../shared/store/document-store';
import type { AppError } from '../../../../shared/http/errors';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import { TokenIssuanceError } from '../../../../shared/security/security.errors';
import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';
import { err, ok, type Result } from '../../../../shared/result/result';

import type { UserRepo } from '../../../users';
import { bestEffort } from '../../../_shared/best-effort';

import { AuthErrors } from '../../auth.errors';
import type { LoginTokens } from '../../auth.types';
import { emailDomain } from '../../helpers/email-domain';
import { effectiveRoles } from '../../helpers/effective-roles';
import { loadUserRecord } from '../../helpers/load-user-record';
import { getAccountStatusFailure } from '../../policies/account-status.policy';
import { checkLoginEligibility } from '../../policies/login-eligibility.policy';

const FLOW = 'auth.login';

const emailSchema = z.string().email();

export type LoginParams = {
  email: string | null | undefined;
  password: string | null | undefined;
  ip: string;
  requestId: string;
};

export type LoginDeps = {
  store: DocumentStore;
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  tokenCodec: TokenCodec;
  logger: Logger;
  clock: Clock;
};

export async function executeLoginFlow(
  deps: LoginDeps,
  params: LoginParams,
): Promise<Result<LoginTokens, AppError>> {
  const fail = (reason: string, error: AppError, extra: Record<string, unknown> = {}) => {
    deps.logger.warn({ msg: 'auth.login.failed', flow: FLOW, requestId: params.requestId, reason, ...extra });
    return err(error);
  };

  // 1) presence
  const rawEmail = params.email?.trim() ?? '';
  const password = params.password ?? '';
  if (!rawEmail || !password) {
    return fail('missing_credentials', AuthErrors.missingCredentials());
  }

  // 2) normalize + syntax
  const email = rawEmail.toLowerCase();
  if (!emailSchema.safeParse(email).success) {
    return fail('invalid_email_format', AuthErrors.invalidEmailFormat());
  }

  deps.logger.info({
    msg: 'auth.login.start',
    flow: FLOW,
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    ip: params.ip,
  });

  // 3) + 4) lookup and parse
  const loaded = await loadUserRecord(deps, { by: 'email', email }, { flow: FLOW, requestId: params.requestId });
  if (!loaded.ok) return loaded;

  const user = loaded.value;
  if (!user) {
    return fail('user_not_found', AuthErrors.invalidCredentials(), { emailDomain: emailDomain(email) });
  }

  // 5) account status flags
  const statusFailure = getAccountStatusFailure(user);
  if (statusFailure) {
    return fail(statusFailure.reason, statusFailure.error, { userId: user.user_id });
  }

  // 6) - 8) organization, verified email, stored hash
  const eligible = checkLoginEligibility(user);
  if (!eligible.ok) {
    return fail(eligible.error.reason, eligible.error.error, { userId: user.user_id });
  }
  const { orgId, passwordHash } = eligible.value;

  // 9) password
  const passwordValid = await deps.passwordHasher.verify(password, passwordHash);
  if (!passwordValid) {
    return fail('wrong_password', AuthErrors.invalidCredentials(), { userId: user.user_id });
  }

  if (user.is_logged_in) {
    deps.logger.info({
      msg: 'auth.login.already_logged_in',
      flow: FLOW,
      requestId: params.requestId,
      userId: user.user_id,
    });
  }

  // 10) tokens
  const tokens = issueTokenPair(deps.tokenCodec, {
    subject: user.user_id,
    roles: effectiveRoles(user.roles),
    orgId,
    businessUnitIds: user.business_units,
  });
  if (!tokens.ok) {
    deps.logger.error({
      msg: 'auth.login.token_generation_failed',
      flow: FLOW,
      requestId: params.requestId,
      userId: user.user_id,
      error: tokens.error.message,
    });
    return err(AuthErrors.tokenGenerationFailed());
  }

  // 11) bookkeeping
  await bestEffort(
    deps.logger,
    { msg: 'auth.login.bookkeeping_failed', flow: FLOW, requestId: params.requestId, userId: user.user_id },
    () => deps.userRepo.markLoggedIn(user.user_id, deps.clock().toISOString()),
  );

  deps.logger.info({
    msg: 'auth.login.success',
    flow: FLOW,
    requestId: params.requestId,
    userId: user.user_id,
    orgId,
  });

  // 12)
  return ok({
    access_token: tokens.value.accessToken,
    refresh_token: tokens.value.refreshToken,
    token_type: 'Bearer',
    expires_in: deps.tokenCodec.accessTtlSeconds,
  });
}

function issueTokenPair(
  codec: TokenCodec,
  input: { subject: string; roles: readonly string[]; orgId: string; businessUnitIds: readonly string[] | null },
): Result<{ accessToken: string; refreshToken: string }, TokenIssuanceError> {
  try {
    return ok({
      accessToken: codec.issueAccess(input),
      refreshToken: codec.issueRefresh({
        subject: input.subject,
        orgId: input.orgId,
        businessUnitIds: input.businessUnitIds,
      }),
    });
  } catch (error) {
    if (error instanceof TokenIssuanceError) return err(error);
    throw error;
  }
}
