/**
 * backend/src/modules/organizations/organization.schemas.ts
 *
 * WHY:
 * - Request validation for /organizations.
 * - Both payloads are strict: an unknown top-level key is an INVALID_FIELD error.
 */

import { z } from 'zod';

const text = z.string().trim().nullish();
const idList = z.array(z.string().trim().min(1)).nullish();

const timestamp = z.union([z.string().datetime({ offset: true }), z.string().date()]);

export const organizationAddressInputSchema = z
  .object({
    street: text,
    city: text,
    state: text,
    zip_code: text,
    country: text,
  })
  .strict();

const organizationFields = {
  name: text,
  is_active: z.boolean().nullish(),
  short_name: text,
  description: text,
  primary_contact: text,
  email: z.string().trim().toLowerCase().email().nullish(),
  website: z.string().trim().url().nullish(),
  address: z.union([z.string().trim(), organizationAddressInputSchema]).nullish(),
  parent_org_id: text,
  status: text,
  business_units: idList,
  members: idList,
  projects: idList,
  established_date: timestamp.nullish(),
  metadata: z.record(z.unknown()).nullish(),
};

export const createOrganizationSchema = z
  .object({
    org_id: z.string().trim().min(1).nullish(),
    ...organizationFields,
  })
  .strict();

/** org_id, created_at and updated_at are not client-writable. */
export const updateOrganizationSchema = z.object(organizationFields).strict();

export const orgIdParamsSchema = z.object({
  orgId: z.string().trim().min(1),
});

export type CreateOrganizationInput = z.infer<typeof createOrganizationSchema>;
export type UpdateOrganizationInput = z.infer<typeof updateOrganizationSchema>;
