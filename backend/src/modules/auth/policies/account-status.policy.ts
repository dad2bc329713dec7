/**
 * backend/src/modules/auth/policies/account-status.policy.ts
 *
 * WHY:
 * - Login and refresh both refuse accounts that are inactive, banned or suspended.
 * - Keep it pure + unit-testable (no store, no HTTP).
 *
 * RULES:
 * - Fixed order, first failure wins: is_active, then is_banned, then is_suspended.
 * - A null flag counts as its default (active, not banned, not suspended).
 */

import type { AppError } from '../../../shared/http/errors';
import { AuthErrors } from '../auth.errors';

export type AccountStatusFlags = Readonly<{
  is_active: boolean | null;
  is_banned: boolean | null;
  is_suspended: boolean | null;
}>;

export type AccountStatusFailure =
  | { reason: 'account_inactive'; error: AppError }
  | { reason: 'account_banned'; error: AppError }
  | { reason: 'account_suspended'; error: AppError };

export function getAccountStatusFailure(account: AccountStatusFlags): AccountStatusFailure | null {
  if (account.is_active === false) {
    return { reason: 'account_inactive', error: AuthErrors.accountInactive() };
  }
  if (account.is_banned === true) {
    return { reason: 'account_banned', error: AuthErrors.accountBanned() };
  }
  if (account.is_suspended === true) {
    return { reason: 'account_suspended', error: AuthErrors.accountSuspended() };
  }
  return null;
}
