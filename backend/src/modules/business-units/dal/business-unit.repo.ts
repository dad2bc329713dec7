/**
 * backend/src/modules/business-units/dal/business-unit.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for business units.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { PatchSet } from '../../../shared/patch/field-patch-builder';
import type { BusinessUnitDocument } from '../business-unit.types';

export class BusinessUnitRepo {
  constructor(private readonly store: DocumentStore) {}

  private get units() {
    return this.store.collection('business_units');
  }

  /** Throws DuplicateDocumentError when bu_id is taken. */
  async insertBusinessUnit(unit: BusinessUnitDocument): Promise<void> {
    await this.units.insertOne(unit.bu_id, { ...unit });
  }

  updateBusinessUnit(params: { orgId: string; buId: string }, set: PatchSet): Promise<boolean> {
    return this.units.updateOne({ bu_id: params.buId, parent_org: params.orgId }, set);
  }

  deleteBusinessUnit(params: { orgId: string; buId: string }): Promise<boolean> {
    return this.units.deleteOne({ bu_id: params.buId, parent_org: params.orgId });
  }
}
