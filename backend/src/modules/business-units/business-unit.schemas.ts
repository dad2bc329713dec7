/**
 * backend/src/modules/business-units/business-unit.schemas.ts
 *
 * WHY:
 * - Request validation for /organizations/:orgId/business-units.
 * - `parent_org` comes from the route, never from the body.
 */

import { z } from 'zod';

const text = z.string().trim().nullish();
const idList = z.array(z.string().trim().min(1)).nullish();

const businessUnitFields = {
  name: text,
  description: text,
  parent_bu_id: text,
  head: text,
  members: idList,
  projects: idList,
  status: text,
  metadata: z.record(z.unknown()).nullish(),
};

export const createBusinessUnitSchema = z
  .object({
    bu_id: z.string().trim().min(1).nullish(),
    ...businessUnitFields,
  })
  .strict();

export const updateBusinessUnitSchema = z.object(businessUnitFields).strict();

export const businessUnitParamsSchema = z.object({
  orgId: z.string().trim().min(1),
  buId: z.string().trim().min(1),
});

export type CreateBusinessUnitInput = z.infer<typeof createBusinessUnitSchema>;
export type UpdateBusinessUnitInput = z.infer<typeof updateBusinessUnitSchema>;
