/**
 * backend/src/modules/users/helpers/build-user-document.ts
 *
 * WHY:
 * - Register and admin-create write the same complete user document; every section
 *   is always present with its defaults so later partial updates (which only touch
 *   existing fields) can reach every patchable field.
 *
 * RULES:
 * - Pure: ids, timestamps and the password hash are computed by the caller.
 */

import type { CreateUserInput } from '../user.schemas';
import type { UserDocument } from '../user.types';

export type BuildUserDocumentParams = Readonly<{
  userId: string;
  email: string;
  username: string;
  passwordHash: string;
  orgId: string | null;
  now: string;
  input: CreateUserInput;
  registration: Readonly<{
    source: string;
    ip: string | null;
    userAgent: string | null;
  }>;
}>;

type Section<K extends keyof CreateUserInput> = NonNullable<CreateUserInput[K]>;

function nonEmpty<T>(list: readonly T[] | null | undefined, fallback: T[]): T[] {
  return list && list.length > 0 ? [...list] : fallback;
}

export function buildUserDocument(params: BuildUserDocumentParams): UserDocument {
  const { input, now } = params;
  const profile: Section<'profile'> = input.profile ?? {};
  const address: Section<'address'> = input.address ?? {};
  const preferences: Section<'preferences'> = input.preferences ?? {};
  const security: Section<'security'> = input.security ?? {};
  const membership: Section<'membership'> = input.membership ?? {};

  return {
    user_id: params.userId,
    email: params.email,
    username: params.username,

    profile: {
      first_name: profile.first_name || '',
      last_name: profile.last_name || '',
      bio: profile.bio ?? null,
      date_of_birth: profile.date_of_birth ?? null,
      profile_picture_url: profile.profile_picture_url ?? null,
      phone_number: profile.phone_number ?? null,
      gender: profile.gender ?? null,
      locale: profile.locale || 'en-US',
      timezone: profile.timezone ?? null,
    },

    address: {
      street: address.street ?? null,
      city: address.city ?? null,
      state: address.state ?? null,
      postal_code: address.postal_code ?? null,
      country: address.country ?? null,
    },

    preferences: {
      theme: preferences.theme || 'light',
      notifications_enabled: preferences.notifications_enabled ?? true,
      email_notifications_enabled: preferences.email_notifications_enabled ?? true,
      is_public: preferences.is_public ?? true,
      content_language: preferences.content_language || 'en',
    },

    security: {
      is_email_verified: security.is_email_verified ?? false,
      is_phone_verified: security.is_phone_verified ?? false,
      password_hash: params.passwordHash,
      last_login: null,
      mfa_enabled: security.mfa_enabled ?? false,
      recovery_codes: [],
    },

    org_id: params.orgId,
    business_units: input.business_units ? [...input.business_units] : [],

    membership: {
      status: membership.status || 'free_tier',
      start_date: membership.start_date ?? now,
      end_date: membership.end_date ?? null,
    },

    social_profiles: (input.social_profiles ?? []).map((social) => ({
      platform: social.platform ?? '',
      url: social.url ?? '',
      handle: social.handle ?? '',
    })),

    roles: nonEmpty(input.roles, ['user']),
    groups: input.groups ? [...input.groups] : [],
    tags: nonEmpty(input.tags, ['new_user']),

    metadata: {
      ...input.metadata,
      registration_ip: params.registration.ip,
      registration_source: params.registration.source,
      last_activity: now,
      user_agent: params.registration.userAgent,
      referral_source: null,
    },

    created_at: now,
    updated_at: now,

    is_active: input.is_active ?? true,
    is_banned: input.is_banned ?? false,
    is_suspended: input.is_suspended ?? false,
    is_logged_in: false,
  };
}
