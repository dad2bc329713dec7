/**
 * backend/src/modules/business-units/index.ts
 *
 * WHY:
 * - Public surface of the business-units module (read-only contracts).
 */

export { getBusinessUnitsByIds, hasBusinessUnitsInOrganization } from './queries/business-unit.queries';
export { businessUnitDocumentSchema } from './business-unit.types';
export type { BusinessUnitDocument } from './business-unit.types';
