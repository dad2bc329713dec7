/**
 * backend/src/modules/organizations/index.ts
 *
 * WHY:
 * - Public surface of the organizations module.
 * - Business units and projects keep the org's reverse-reference lists up to date
 *   and read the org itself; they go through here, not /dal or /queries.
 */

export { getOrganizationById, parseOrganizationDocument } from './queries/organization.queries';
export type { OrganizationRepo, OrganizationChildList } from './dal/organization.repo';
export { OrganizationErrors } from './organization.errors';
export { orgIdParamsSchema } from './organization.schemas';
export { toOrganizationRef } from './organization.types';
export type { OrganizationDocument, OrganizationRef } from './organization.types';
