/**
 * backend/src/modules/business-units/queries/business-unit.queries.ts
 *
 * RULES:
 * - Read-only. No AppError.
 * - Every lookup is scoped to the owning organization (`parent_org`).
 */

import type { DocumentStore, FindManyOptions, StoredDocument } from '../../../shared/store/document-store';
import type { Result } from '../../../shared/result/result';
import { parseDocument, type InvalidDocument } from '../../../shared/store/parse-document';
import { businessUnitDocumentSchema, type BusinessUnitDocument } from '../business-unit.types';

export function parseBusinessUnitDocument(
  raw: StoredDocument,
): Result<BusinessUnitDocument, InvalidDocument> {
  return parseDocument(businessUnitDocumentSchema, raw, 'bu_id');
}

export function getBusinessUnit(
  store: DocumentStore,
  params: { orgId: string; buId: string },
): Promise<StoredDocument | null> {
  return store.collection('business_units').findOne({ bu_id: params.buId, parent_org: params.orgId });
}

export function getBusinessUnitById(store: DocumentStore, buId: string): Promise<StoredDocument | null> {
  return store.collection('business_units').findOne({ bu_id: buId });
}

export async function isBusinessUnitNameTaken(
  store: DocumentStore,
  params: { orgId: string; name: string; exceptBuId?: string },
): Promise<boolean> {
  const found = await store.collection('business_units').findOne(
    params.exceptBuId
      ? { parent_org: params.orgId, name: params.name, bu_id: { $ne: params.exceptBuId } }
      : { parent_org: params.orgId, name: params.name },
  );
  return found !== null;
}

export async function hasBusinessUnitsInOrganization(store: DocumentStore, orgId: string): Promise<boolean> {
  return (await store.collection('business_units').count({ parent_org: orgId })) > 0;
}

export async function hasChildBusinessUnits(
  store: DocumentStore,
  params: { orgId: string; buId: string },
): Promise<boolean> {
  const count = await store
    .collection('business_units')
    .count({ parent_org: params.orgId, parent_bu_id: params.buId });
  return count > 0;
}

export async function listBusinessUnits(
  store: DocumentStore,
  orgId: string,
  page: FindManyOptions,
): Promise<{ rows: StoredDocument[]; total: number }> {
  const units = store.collection('business_units');
  const filter = { parent_org: orgId };
  const [total, rows] = await Promise.all([units.count(filter), units.findMany(filter, page)]);
  return { rows, total };
}

/** Resolves an id list in one query; ids with no stored document are simply absent. */
export function getBusinessUnitsByIds(
  store: DocumentStore,
  buIds: readonly string[],
): Promise<StoredDocument[]> {
  if (buIds.length === 0) return Promise.resolve([]);
  return store
    .collection('business_units')
    .findMany({ bu_id: { $in: buIds } }, { limit: buIds.length, skip: 0 });
}
