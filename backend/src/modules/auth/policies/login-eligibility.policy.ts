/**
 * backend/src/modules/auth/policies/login-eligibility.policy.ts
 *
 * WHY:
 * - After the status flags, a login also needs an organization, a verified email and
 *   a stored password hash. These run BEFORE the password is verified, so an
 *   unverified account gets EMAIL_NOT_VERIFIED whatever password was sent.
 *
 * RULES:
 * - Order: org_id, then is_email_verified, then password_hash.
 * - A missing hash is ACCOUNT_CONFIG_ERROR (500).
 * - On success the org id and hash come back as plain strings for the verify and token steps.
 */

import type { AppError } from '../../../shared/http/errors';
import { err, ok, type Result } from '../../../shared/result/result';
import { AuthErrors } from '../auth.errors';

export type LoginCandidate = Readonly<{
  org_id: string | null;
  security: Readonly<{
    is_email_verified: boolean | null;
    password_hash: string | null;
  }> | null;
}>;

export type LoginCredentials = Readonly<{ orgId: string; passwordHash: string }>;

export type LoginEligibilityFailure =
  | { reason: 'no_organization'; error: AppError }
  | { reason: 'email_not_verified'; error: AppError }
  | { reason: 'missing_password_hash'; error: AppError };

export function checkLoginEligibility(
  candidate: LoginCandidate,
): Result<LoginCredentials, LoginEligibilityFailure> {
  if (!candidate.org_id) {
    return err({ reason: 'no_organization', error: AuthErrors.noOrganization() });
  }
  if (candidate.security?.is_email_verified !== true) {
    return err({ reason: 'email_not_verified', error: AuthErrors.emailNotVerified() });
  }
  if (!candidate.security.password_hash) {
    return err({ reason: 'missing_password_hash', error: AuthErrors.accountConfigError() });
  }
  return ok({ orgId: candidate.org_id, passwordHash: candidate.security.password_hash });
}
