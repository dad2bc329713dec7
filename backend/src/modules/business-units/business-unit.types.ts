/**
 * backend/src/modules/business-units/business-unit.types.ts
 *
 * WHY:
 * - Domain types for business units (sub-divisions of an organization).
 *
 * RULES:
 * - `parent_org` is the owning organization; every read is scoped by it.
 * - `parent_bu_id` builds a unit hierarchy inside the same organization.
 */

import { z } from 'zod';

const optionalText = z.string().nullable().default(null);
const idList = z.array(z.string()).nullable().default(null);

export const DEFAULT_BUSINESS_UNIT_STATUS = 'active';

export const businessUnitDocumentSchema = z.object({
  bu_id: z.string().min(1),
  name: optionalText,
  description: optionalText,

  parent_org: optionalText,
  parent_bu_id: optionalText,
  head: optionalText,

  members: idList,
  projects: idList,

  status: optionalText,
  created_at: optionalText,
  updated_at: optionalText,

  metadata: z.record(z.unknown()).nullable().default(null),
});

export type BusinessUnitDocument = z.infer<typeof businessUnitDocumentSchema>;
