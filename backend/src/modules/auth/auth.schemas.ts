/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - The login schema only checks types: presence and email syntax are login-flow
 *   steps with their own error codes (MISSING_CREDENTIALS, INVALID_EMAIL_FORMAT).
 * - The register payload is users/user.schemas registerUserSchema.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().nullish(),
  password: z.string().nullish(),
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1, 'Refresh token is required'),
});
