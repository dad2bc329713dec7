import { z } from 'zod';

/**
 * Response shapes the e2e suites assert on. Objects pass unknown keys through so
 * tests can also check what must NOT be present.
 */

export const publicUserSchema = z
  .object({
    user_id: z.string(),
    email: z.string(),
    username: z.string(),
    org_id: z.string().nullable(),
    roles: z.array(z.string()).nullable(),
    tags: z.array(z.string()).nullable(),
    business_units: z.array(z.string()).nullable(),
    is_active: z.boolean(),
    is_logged_in: z.boolean(),
    updated_at: z.string(),
    profile: z.object({ first_name: z.string(), last_name: z.string() }).passthrough().nullable(),
    security: z
      .object({ is_email_verified: z.boolean(), last_login: z.string().nullable() })
      .passthrough()
      .nullable(),
  })
  .passthrough();

export const organizationRefSchema = z.object({ org_id: z.string(), name: z.string() });

export const organizationSchema = z
  .object({
    org_id: z.string(),
    name: z.string(),
    status: z.string(),
    is_active: z.boolean(),
    business_units: z.array(z.string()),
    projects: z.array(z.string()),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .passthrough();

export const businessUnitSchema = z
  .object({
    bu_id: z.string(),
    name: z.string(),
    parent_org: z.string(),
    status: z.string(),
    updated_at: z.string(),
  })
  .passthrough();

export const projectSchema = z
  .object({
    project_id: z.string(),
    name: z.string(),
    org_id: z.string(),
    status: z.string(),
    owner: z.string().nullable(),
    modules: z.array(z.string()),
    updated_at: z.string(),
  })
  .passthrough();

export const projectModuleSchema = z
  .object({
    module_id: z.string(),
    project_id: z.string(),
    name: z.string(),
    status: z.string(),
    updated_at: z.string(),
  })
  .passthrough();
