/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics.
 * - Shared by /users (admin CRUD) and /auth (register, me, logout) since both
 *   operate on the same user documents.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('USER_NOT_FOUND', 'User not found', { field: 'user_id', meta });
  },

  missingRequiredFields(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_REQUIRED_FIELDS', 'Missing required fields', {
      detail: 'Email, password, and username are required',
      field: 'email,password,username',
      meta,
    });
  },

  invalidEmailFormat(meta?: AppErrorMeta) {
    return AppError.badRequest('INVALID_EMAIL_FORMAT', 'Invalid email format', {
      field: 'email',
      meta,
    });
  },

  invalidPassword(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'INVALID_PASSWORD',
      'Password must be between 8 and 128 characters',
      { field: 'password', meta },
    );
  },

  emailAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('EMAIL_ALREADY_EXISTS', 'Email address is already registered', {
      field: 'email',
      meta,
    });
  },

  emailTakenByOther(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'EMAIL_ALREADY_EXISTS',
      'Email address is already registered by another user',
      { field: 'email', meta },
    );
  },

  usernameAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('USERNAME_ALREADY_EXISTS', 'Username is already taken', {
      field: 'username',
      meta,
    });
  },

  usernameTakenByOther(meta?: AppErrorMeta) {
    return AppError.badRequest(
      'USERNAME_ALREADY_EXISTS',
      'Username is already taken by another user',
      { field: 'username', meta },
    );
  },

  userIdAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('USER_ID_ALREADY_EXISTS', 'User ID already exists', {
      field: 'user_id',
      meta,
    });
  },

  /** Stored record no longer matches the user document shape. */
  userDataFormatError(meta?: AppErrorMeta) {
    return AppError.internal('USER_DATA_FORMAT_ERROR', 'User data format error', {
      field: 'user_data',
      meta,
    });
  },

  passwordHashingFailed(meta?: AppErrorMeta) {
    return AppError.internal('PASSWORD_ENCRYPTION_ERROR', 'Password encryption failed', {
      field: 'password',
      meta,
    });
  },
} as const;
