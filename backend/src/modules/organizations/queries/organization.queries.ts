/**
 * backend/src/modules/organizations/queries/organization.queries.ts
 *
 * WHY:
 * - Read-only lookups over the `organizations` collection.
 * - Lookups return raw documents; parseOrganizationDocument() shapes them.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DocumentStore, FindManyOptions, StoredDocument } from '../../../shared/store/document-store';
import type { Result } from '../../../shared/result/result';
import { parseDocument, type InvalidDocument } from '../../../shared/store/parse-document';
import { organizationDocumentSchema, type OrganizationDocument } from '../organization.types';

export function parseOrganizationDocument(
  raw: StoredDocument,
): Result<OrganizationDocument, InvalidDocument> {
  return parseDocument(organizationDocumentSchema, raw, 'org_id');
}

export function getOrganizationById(store: DocumentStore, orgId: string): Promise<StoredDocument | null> {
  return store.collection('organizations').findOne({ org_id: orgId });
}

export function getOrganizationByName(store: DocumentStore, name: string): Promise<StoredDocument | null> {
  return store.collection('organizations').findOne({ name });
}

export async function isOrganizationNameTakenByOther(
  store: DocumentStore,
  name: string,
  orgId: string,
): Promise<boolean> {
  const other = await store.collection('organizations').findOne({ name, org_id: { $ne: orgId } });
  return other !== null;
}

export async function listOrganizations(
  store: DocumentStore,
  page: FindManyOptions,
): Promise<{ rows: StoredDocument[]; total: number }> {
  const organizations = store.collection('organizations');
  const [total, rows] = await Promise.all([organizations.count({}), organizations.findMany({}, page)]);
  return { rows, total };
}
