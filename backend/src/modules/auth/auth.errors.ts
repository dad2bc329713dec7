/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  missingCredentials(meta?: AppErrorMeta) {
    return AppError.badRequest('MISSING_CREDENTIALS', 'Email and password are required', {
      field: 'email,password',
      meta,
    });
  },

  invalidEmailFormat(meta?: AppErrorMeta) {
    return AppError.badRequest('INVALID_EMAIL_FORMAT', 'Invalid email format', { field: 'email', meta });
  },

  /** Unknown email and wrong password share this error. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('INVALID_CREDENTIALS', 'Invalid email or password', {
      field: 'email,password',
      meta,
    });
  },

  accountInactive(meta?: AppErrorMeta) {
    return AppError.forbidden('ACCOUNT_INACTIVE', 'Account is inactive', { field: 'is_active', meta });
  },

  accountBanned(meta?: AppErrorMeta) {
    return AppError.forbidden('ACCOUNT_BANNED', 'Account has been banned', { field: 'is_banned', meta });
  },

  accountSuspended(meta?: AppErrorMeta) {
    return AppError.forbidden('ACCOUNT_SUSPENDED', 'Account has been suspended', {
      field: 'is_suspended',
      meta,
    });
  },

  noOrganization(meta?: AppErrorMeta) {
    return AppError.forbidden('NO_ORGANIZATION', 'User is not assigned to any organization', {
      field: 'org_id',
      meta,
    });
  },

  emailNotVerified(meta?: AppErrorMeta) {
    return AppError.forbidden('EMAIL_NOT_VERIFIED', 'Email address has not been verified', {
      field: 'is_email_verified',
      meta,
    });
  },

  /** The stored record has no password hash: an operator problem, not the user's. */
  accountConfigError(meta?: AppErrorMeta) {
    return AppError.internal('ACCOUNT_CONFIG_ERROR', 'Account configuration error', {
      field: 'password_hash',
      meta,
    });
  },

  tokenGenerationFailed(meta?: AppErrorMeta) {
    return AppError.internal('TOKEN_GENERATION_ERROR', 'Failed to generate authentication tokens', {
      field: 'token',
      meta,
    });
  },
} as const;
