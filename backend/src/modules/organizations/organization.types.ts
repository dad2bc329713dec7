/**
 * backend/src/modules/organizations/organization.types.ts
 *
 * WHY:
 * - Domain types for the Organizations module.
 * - Stored documents are parsed before use; a record that does not parse is skipped
 *   in lists and reported as a 500 on single reads.
 *
 * RULES:
 * - `address` is either free text or a structured object; both shapes are legal.
 * - `status === 'active'` is what the caller-organization check looks at,
 *   not `is_active`.
 */

import { z } from 'zod';

export type OrgId = string;

const optionalText = z.string().nullable().default(null);
const idList = z.array(z.string()).nullable().default(null);

export const ACTIVE_ORGANIZATION_STATUS = 'active';

export const organizationAddressSchema = z.object({
  street: optionalText,
  city: optionalText,
  state: optionalText,
  zip_code: optionalText,
  country: optionalText,
});

export const organizationDocumentSchema = z.object({
  org_id: z.string().min(1),
  name: optionalText,
  is_active: z.boolean().nullable().default(null),
  short_name: optionalText,
  description: optionalText,

  primary_contact: optionalText,
  email: optionalText,
  website: optionalText,
  address: z.union([z.string(), organizationAddressSchema]).nullable().default(null),

  parent_org_id: optionalText,
  status: optionalText,
  business_units: idList,
  members: idList,
  projects: idList,

  established_date: optionalText,
  created_at: optionalText,
  updated_at: optionalText,

  metadata: z.record(z.unknown()).nullable().default(null),
});

export type OrganizationAddress = z.infer<typeof organizationAddressSchema>;
export type OrganizationDocument = z.infer<typeof organizationDocumentSchema>;

/** Compact reference embedded in list responses of child resources. */
export type OrganizationRef = Readonly<{ org_id: string; name: string | null }>;

export function toOrganizationRef(org: OrganizationDocument): OrganizationRef {
  return { org_id: org.org_id, name: org.name };
}
