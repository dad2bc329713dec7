/**
 * backend/src/modules/projects/project.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProjectErrors = {
  /** Also used when the project exists but belongs to another organization. */
  projectNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('PROJECT_NOT_FOUND', 'Project not found', { field: 'project_id', meta });
  },

  missingName(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_PROJECT_NAME', 'Project name is required', { field: 'name', meta });
  },

  projectIdAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('PROJECT_ID_ALREADY_EXISTS', 'Project ID already exists', {
      field: 'project_id',
      meta,
    });
  },

  nameAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'PROJECT_NAME_ALREADY_EXISTS',
      'Project name already exists in this organization',
      { field: 'name', meta },
    );
  },

  hasDependencies(meta?: AppErrorMeta) {
    return AppError.badRequest('PROJECT_HAS_DEPENDENCIES', 'Cannot delete project with existing modules', {
      field: 'modules',
      meta,
    });
  },

  dataFormatError(meta?: AppErrorMeta) {
    return AppError.internal('PROJECT_MODEL_ERROR', 'Project data validation failed', {
      field: 'project_data',
      meta,
    });
  },
} as const;
