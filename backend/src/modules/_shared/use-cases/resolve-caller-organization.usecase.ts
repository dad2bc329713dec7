/**
 * src/modules/_shared/use-cases/resolve-caller-organization.usecase.ts
 *
 * WHY:
 * - Every admin operation (except listing organizations) starts by loading the
 *   caller's organization and refusing to continue when it is missing or inactive.
 * - Users, organizations, business units, projects and modules all need it, so it
 *   lives here instead of in one module's service.
 *
 * RULES:
 * - Logs the precise reason; the client only sees INVALID_ORGANIZATION.
 * - A stored organization that fails to parse is a 500 (corrupt data), not a 400.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { Logger } from '../../../shared/logger/logger';
import type { Principal } from '../../../shared/security/principal';

import {
  getOrganizationById,
  parseOrganizationDocument,
} from '../../organizations/queries/organization.queries';
import {
  assertCallerOrganizationActive,
  getCallerOrganizationFailure,
} from '../../organizations/policies/caller-organization.policy';
import { OrganizationErrors } from '../../organizations/organization.errors';
import type { OrganizationDocument } from '../../organizations/organization.types';

export async function resolveCallerOrganization(
  deps: { store: DocumentStore; logger: Logger },
  params: { principal: Principal; requestId: string; flow: string },
): Promise<OrganizationDocument> {
  const orgId = params.principal.orgId;

  let organization: OrganizationDocument | null = null;
  if (orgId) {
    const raw = await getOrganizationById(deps.store, orgId);
    if (raw) {
      const parsed = parseOrganizationDocument(raw);
      if (!parsed.ok) {
        deps.logger.error({
          msg: 'org.caller.corrupt_record',
          flow: params.flow,
          requestId: params.requestId,
          orgId,
          issues: parsed.error.issues,
        });
        throw OrganizationErrors.dataFormatError({ orgId });
      }
      organization = parsed.value;
    }
  }

  const failure = getCallerOrganizationFailure(orgId, organization);
  if (failure) {
    deps.logger.warn({
      msg: 'org.caller.rejected',
      flow: params.flow,
      requestId: params.requestId,
      userId: params.principal.userId,
      orgId,
      reason: failure.reason,
    });
  }
  assertCallerOrganizationActive(orgId, organization);

  return organization;
}
