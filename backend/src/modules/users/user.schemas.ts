/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Request validation for user endpoints (and the register payload in auth).
 *
 * RULES:
 * - Create payloads strip unknown keys; presence of email/username/password is
 *   checked by the provisioning use-case so the client gets MISSING_REQUIRED_FIELDS.
 * - The update payload is strict at the top level: unknown keys → INVALID_FIELD.
 *   Nested sections strip unknown keys, so `security.password_hash` can never be patched.
 */

import { z } from 'zod';

const text = z.string().trim().nullish();

export const profileInputSchema = z.object({
  first_name: text,
  last_name: text,
  bio: text,
  date_of_birth: z.string().date().nullish(),
  profile_picture_url: z.string().url().nullish(),
  phone_number: text,
  gender: text,
  locale: text,
  timezone: text,
});

export const addressInputSchema = z.object({
  street: text,
  city: text,
  state: text,
  postal_code: text,
  country: text,
});

export const preferencesInputSchema = z.object({
  theme: text,
  notifications_enabled: z.boolean().nullish(),
  email_notifications_enabled: z.boolean().nullish(),
  is_public: z.boolean().nullish(),
  content_language: text,
});

export const securityInputSchema = z.object({
  is_email_verified: z.boolean().nullish(),
  is_phone_verified: z.boolean().nullish(),
  mfa_enabled: z.boolean().nullish(),
});

export const membershipInputSchema = z.object({
  status: text,
  start_date: z.string().datetime({ offset: true }).nullish(),
  end_date: z.string().datetime({ offset: true }).nullish(),
});

export const socialProfileInputSchema = z.object({
  platform: text,
  url: z.string().url().nullish(),
  handle: text,
});

const credentialsShape = {
  email: z.string().trim().toLowerCase().nullish(),
  username: z.string().trim().nullish(),
  password: z.string().nullish(),
};

/** POST /auth/register: self-service sign-up. Privileged fields are not accepted. */
export const registerUserSchema = z.object({
  ...credentialsShape,
  profile: profileInputSchema.nullish(),
  address: addressInputSchema.nullish(),
  preferences: preferencesInputSchema.nullish(),
  social_profiles: z.array(socialProfileInputSchema).nullish(),
});

/** POST /users: admin-created user. */
export const createUserSchema = registerUserSchema.extend({
  security: securityInputSchema.nullish(),
  org_id: z.string().trim().min(1).nullish(),
  business_units: z.array(z.string().min(1)).nullish(),
  membership: membershipInputSchema.nullish(),
  roles: z.array(z.string().min(1)).nullish(),
  groups: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
  metadata: z.record(z.unknown()).nullish(),
  is_active: z.boolean().nullish(),
  is_banned: z.boolean().nullish(),
  is_suspended: z.boolean().nullish(),
});

export const updateUserSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().nullish(),
    username: z.string().trim().min(1).nullish(),
    profile: profileInputSchema.partial().nullish(),
    address: addressInputSchema.partial().nullish(),
    preferences: preferencesInputSchema.partial().nullish(),
    security: securityInputSchema.partial().nullish(),
    org_id: z.string().trim().min(1).nullish(),
    business_units: z.array(z.string().min(1)).nullish(),
    membership: membershipInputSchema.partial().nullish(),
    social_profiles: z.array(socialProfileInputSchema).nullish(),
    roles: z.array(z.string().min(1)).nullish(),
    groups: z.array(z.string()).nullish(),
    tags: z.array(z.string()).nullish(),
    metadata: z.record(z.unknown()).nullish(),
    is_active: z.boolean().nullish(),
    is_banned: z.boolean().nullish(),
    is_suspended: z.boolean().nullish(),
  })
  .strict();

export const userIdParamsSchema = z.object({
  userId: z.string().trim().min(1),
});

export type RegisterUserInput = z.infer<typeof registerUserSchema>;
export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
