/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - The stored user document is parsed with userDocumentSchema before any business
 *   rule reads it; a record that fails to parse is corrupt data (500), not a client error.
 *
 * RULES:
 * - Keep aligned with the document written by helpers/build-user-document.ts.
 * - Missing optional sections parse to null; status flags parse to their defaults
 *   when absent (is_active=true, is_banned/is_suspended/is_logged_in=false).
 * - password_hash and recovery_codes never leave the service layer (see toPublicUser).
 */

import { z } from 'zod';

const optionalText = z.string().nullable().default(null);

export const profileSchema = z.object({
  first_name: optionalText,
  last_name: optionalText,
  bio: optionalText,
  date_of_birth: optionalText,
  profile_picture_url: optionalText,
  phone_number: optionalText,
  gender: optionalText,
  locale: z.string().nullable().default('en-US'),
  timezone: optionalText,
});

export const addressSchema = z.object({
  street: optionalText,
  city: optionalText,
  state: optionalText,
  postal_code: optionalText,
  country: optionalText,
});

export const preferencesSchema = z.object({
  theme: z.string().nullable().default('light'),
  notifications_enabled: z.boolean().nullable().default(true),
  email_notifications_enabled: z.boolean().nullable().default(true),
  is_public: z.boolean().nullable().default(true),
  content_language: z.string().nullable().default('en'),
});

export const securitySchema = z.object({
  is_email_verified: z.boolean().nullable().default(false),
  is_phone_verified: z.boolean().nullable().default(false),
  password_hash: optionalText,
  last_login: optionalText,
  mfa_enabled: z.boolean().nullable().default(false),
  recovery_codes: z.array(z.string()).nullable().default(null),
});

export const membershipSchema = z.object({
  status: z.string().nullable().default('free_tier'),
  start_date: optionalText,
  end_date: optionalText,
});

export const socialProfileSchema = z.object({
  platform: optionalText,
  url: optionalText,
  handle: optionalText,
});

export const userDocumentSchema = z.object({
  user_id: z.string().min(1),
  email: z.string().email(),
  username: optionalText,

  profile: profileSchema.nullable().default(null),
  address: addressSchema.nullable().default(null),
  preferences: preferencesSchema.nullable().default(null),
  security: securitySchema.nullable().default(null),

  org_id: optionalText,
  business_units: z.array(z.string()).nullable().default(null),
  membership: membershipSchema.nullable().default(null),

  social_profiles: z.array(socialProfileSchema).nullable().default([]),
  roles: z.array(z.string()).nullable().default([]),
  groups: z.array(z.string()).nullable().default([]),
  tags: z.array(z.string()).nullable().default([]),
  metadata: z.record(z.unknown()).nullable().default({}),

  created_at: optionalText,
  updated_at: optionalText,

  is_active: z.boolean().nullable().default(true),
  is_banned: z.boolean().nullable().default(false),
  is_suspended: z.boolean().nullable().default(false),
  is_logged_in: z.boolean().nullable().default(false),
});

export type UserProfile = z.infer<typeof profileSchema>;
export type UserAddress = z.infer<typeof addressSchema>;
export type UserPreferences = z.infer<typeof preferencesSchema>;
export type UserSecurity = z.infer<typeof securitySchema>;
export type UserMembership = z.infer<typeof membershipSchema>;
export type SocialProfile = z.infer<typeof socialProfileSchema>;

export type UserDocument = z.infer<typeof userDocumentSchema>;

export type PublicUserSecurity = Omit<UserSecurity, 'password_hash' | 'recovery_codes'>;

export type PublicUser = Omit<UserDocument, 'security'> & {
  security: PublicUserSecurity | null;
};

/** Response shape: drops password_hash and recovery_codes. */
export function toPublicUser(user: UserDocument): PublicUser {
  const { security, ...rest } = user;
  if (!security) return { ...rest, security: null };

  return {
    ...rest,
    security: {
      is_email_verified: security.is_email_verified,
      is_phone_verified: security.is_phone_verified,
      last_login: security.last_login,
      mfa_enabled: security.mfa_enabled,
    },
  };
}
