/**
 * backend/src/shared/security/access-predicates.ts
 *
 * WHY:
 * - Authorization checks layered after authentication. Pure functions over a Principal
 *   so they compose and unit-test without Fastify.
 *
 * RULES:
 * - Each check returns the Principal unchanged on success.
 * - Failures carry an internal reason only; the HTTP layer maps every AccessDenied to the
 *   same generic 403 so clients can't tell which check failed.
 * - Combined org+role checks the organization first.
 */

import { err, ok, type Result } from '../result/result';
import type { Principal } from './principal';

export const ADMIN_ROLE = 'admin';

export type AccessDeniedReason = 'role_mismatch' | 'organization_mismatch' | 'business_unit_mismatch';

export type AccessDenied = Readonly<{
  reason: AccessDeniedReason;
  message: string;
}>;

export type AccessCheck = (principal: Principal) => Result<Principal, AccessDenied>;

function intersects(held: readonly string[], required: readonly string[]): boolean {
  const wanted = new Set(required);
  return held.some((value) => wanted.has(value));
}

export function checkRoles(principal: Principal, required: readonly string[]): Result<Principal, AccessDenied> {
  if (!intersects(principal.roles, required)) {
    return err({ reason: 'role_mismatch', message: `Requires one of roles: ${required.join(', ')}` });
  }
  return ok(principal);
}

export function checkOrganization(principal: Principal, orgId: string): Result<Principal, AccessDenied> {
  if (principal.orgId === null || principal.orgId !== orgId) {
    return err({ reason: 'organization_mismatch', message: 'Access denied: wrong organization' });
  }
  return ok(principal);
}

export function checkBusinessUnits(
  principal: Principal,
  required: readonly string[],
): Result<Principal, AccessDenied> {
  if (!principal.businessUnitIds || !intersects(principal.businessUnitIds, required)) {
    return err({ reason: 'business_unit_mismatch', message: 'Access denied: wrong business units' });
  }
  return ok(principal);
}

export function checkOrgAndRoles(
  principal: Principal,
  orgId: string,
  required: readonly string[],
): Result<Principal, AccessDenied> {
  const orgCheck = checkOrganization(principal, orgId);
  if (!orgCheck.ok) return orgCheck;
  return checkRoles(principal, required);
}

export function checkAdmin(principal: Principal): Result<Principal, AccessDenied> {
  return checkRoles(principal, [ADMIN_ROLE]);
}
