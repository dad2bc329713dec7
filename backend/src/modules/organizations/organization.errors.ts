/**
 * backend/src/modules/organizations/organization.errors.ts
 *
 * WHY:
 * - Organizations module owns its domain semantics.
 * - INVALID_ORGANIZATION lives here because every admin module runs the
 *   caller-organization check (modules/_shared/use-cases/resolve-caller-organization).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const OrganizationErrors = {
  /** Caller's own organization is missing or not `status: 'active'`. */
  invalidOrganization(orgId: string | null, meta?: AppErrorMeta) {
    return AppError.badRequest('INVALID_ORGANIZATION', 'Invalid or inactive organization', {
      field: 'org_id',
      data: { org_id: orgId },
      meta,
    });
  },

  organizationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('ORGANIZATION_NOT_FOUND', 'Organization not found', {
      field: 'org_id',
      meta,
    });
  },

  parentOrganizationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('PARENT_ORGANIZATION_NOT_FOUND', 'Parent organization not found', {
      field: 'org_id',
      meta,
    });
  },

  missingName(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_ORGANIZATION_NAME', 'Organization name is required', {
      field: 'name',
      meta,
    });
  },

  orgIdAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('ORG_ID_ALREADY_EXISTS', 'Organization ID already exists', {
      field: 'org_id',
      meta,
    });
  },

  nameAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('ORG_NAME_ALREADY_EXISTS', 'Organization name already exists', {
      field: 'name',
      meta,
    });
  },

  nameTakenByOther(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'ORG_NAME_ALREADY_EXISTS',
      'Organization name is already taken by another organization',
      { field: 'name', meta },
    );
  },

  hasDependencies(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'ORGANIZATION_HAS_DEPENDENCIES',
      'Cannot delete organization with existing business units',
      { field: 'business_units', meta },
    );
  },

  dataFormatError(meta?: AppErrorMeta) {
    return AppError.internal('ORGANIZATION_MODEL_ERROR', 'Organization data validation failed', {
      field: 'organization_data',
      meta,
    });
  },
} as const;
