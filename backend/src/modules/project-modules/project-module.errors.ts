/**
 * backend/src/modules/project-modules/project-module.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProjectModuleErrors = {
  moduleNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('MODULE_NOT_FOUND', 'Module not found', { field: 'module_id', meta });
  },

  missingName(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_MODULE_NAME', 'Module name is required', { field: 'name', meta });
  },

  moduleIdAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('MODULE_ID_ALREADY_EXISTS', 'Module ID already exists', {
      field: 'module_id',
      meta,
    });
  },

  nameAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('MODULE_NAME_ALREADY_EXISTS', 'Module name already exists in this project', {
      field: 'name',
      meta,
    });
  },

  dataFormatError(meta?: AppErrorMeta) {
    return AppError.internal('MODULE_MODEL_ERROR', 'Module data validation failed', {
      field: 'module_data',
      meta,
    });
  },
} as const;
