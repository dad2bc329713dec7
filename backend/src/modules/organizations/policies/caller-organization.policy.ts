/**
 * backend/src/modules/organizations/policies/caller-organization.policy.ts
 *
 * WHY:
 * - Admin operations act on behalf of the caller's organization; a caller whose
 *   organization was deleted or deactivated must not keep administering data.
 * - Pure + unit-testable (no store, no HTTP).
 *
 * RULES:
 * - No org id on the token       → invalid
 * - Organization not found       → invalid
 * - status !== 'active'          → invalid
 * - All three surface as the same 400 INVALID_ORGANIZATION; the reason is for logs.
 */

import type { AppError } from '../../../shared/http/errors';
import { OrganizationErrors } from '../organization.errors';
import { ACTIVE_ORGANIZATION_STATUS, type OrganizationDocument } from '../organization.types';

export type CallerOrganizationFailure =
  | { reason: 'no_org_claim'; error: AppError }
  | { reason: 'org_not_found'; error: AppError }
  | { reason: 'org_not_active'; error: AppError };

export function getCallerOrganizationFailure(
  orgId: string | null,
  organization: OrganizationDocument | null,
): CallerOrganizationFailure | null {
  if (!orgId) {
    return { reason: 'no_org_claim', error: OrganizationErrors.invalidOrganization(orgId) };
  }
  if (!organization) {
    return { reason: 'org_not_found', error: OrganizationErrors.invalidOrganization(orgId) };
  }
  if (organization.status !== ACTIVE_ORGANIZATION_STATUS) {
    return { reason: 'org_not_active', error: OrganizationErrors.invalidOrganization(orgId) };
  }
  return null;
}

export function assertCallerOrganizationActive(
  orgId: string | null,
  organization: OrganizationDocument | null,
): asserts organization is OrganizationDocument {
  const failure = getCallerOrganizationFailure(orgId, organization);
  if (failure) throw failure.error;
}
