/**
 * backend/src/shared/http/access-errors.ts
 *
 * WHY:
 * - Authentication/authorization rejections shared by every module.
 *
 * SECURITY:
 * - One 401 for every token problem (missing, malformed, expired, bad signature,
 *   wrong type). One 403 for every failed predicate. The real reason goes to logs only.
 */

import { AppError, type AppErrorMeta } from './errors';

export const AccessErrors = {
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('INVALID_TOKEN', 'Invalid authentication credentials', {
      field: 'authorization',
      meta,
    });
  },

  insufficientPermissions(meta?: AppErrorMeta) {
    return AppError.forbidden('INSUFFICIENT_PERMISSIONS', 'Insufficient permissions', {
      detail: 'Access denied',
      meta,
    });
  },
} as const;
