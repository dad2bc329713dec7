/**
 * backend/src/modules/organizations/dal/organization.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for organizations.
 * - Also maintains the org's reverse-reference lists (business_units, projects);
 *   callers treat those writes as best-effort.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { PatchSet } from '../../../shared/patch/field-patch-builder';
import type { OrganizationDocument } from '../organization.types';

export type OrganizationChildList = 'business_units' | 'projects';

export class OrganizationRepo {
  constructor(private readonly store: DocumentStore) {}

  private get organizations() {
    return this.store.collection('organizations');
  }

  /** Throws DuplicateDocumentError when org_id is taken. */
  async insertOrganization(org: OrganizationDocument): Promise<void> {
    await this.organizations.insertOne(org.org_id, { ...org });
  }

  updateOrganization(orgId: string, set: PatchSet): Promise<boolean> {
    return this.organizations.updateOne({ org_id: orgId }, set);
  }

  deleteOrganization(orgId: string): Promise<boolean> {
    return this.organizations.deleteOne({ org_id: orgId });
  }

  addChild(orgId: string, list: OrganizationChildList, childId: string): Promise<boolean> {
    return this.organizations.addToSet({ org_id: orgId }, list, childId);
  }

  removeChild(orgId: string, list: OrganizationChildList, childId: string): Promise<boolean> {
    return this.organizations.pull({ org_id: orgId }, list, childId);
  }
}
