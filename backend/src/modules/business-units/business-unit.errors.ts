/**
 * backend/src/modules/business-units/business-unit.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const BusinessUnitErrors = {
  businessUnitNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('BUSINESS_UNIT_NOT_FOUND', 'Business unit not found', {
      field: 'bu_id',
      meta,
    });
  },

  missingName(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_BUSINESS_UNIT_NAME', 'Business unit name is required', {
      field: 'name',
      meta,
    });
  },

  buIdAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('BU_ID_ALREADY_EXISTS', 'Business unit ID already exists', {
      field: 'bu_id',
      meta,
    });
  },

  nameAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'BU_NAME_ALREADY_EXISTS',
      'Business unit name already exists in this organization',
      { field: 'name', meta },
    );
  },

  hasDependencies(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'BUSINESS_UNIT_HAS_DEPENDENCIES',
      'Cannot delete business unit with existing child business units',
      { field: 'bu_id', meta },
    );
  },

  dataFormatError(meta?: AppErrorMeta) {
    return AppError.internal('BUSINESS_UNIT_MODEL_ERROR', 'Business unit data validation failed', {
      field: 'business_unit_data',
      meta,
    });
  },
} as const;
