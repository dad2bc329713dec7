/**
 * backend/src/modules/projects/queries/project.queries.ts
 *
 * RULES:
 * - Read-only. No AppError.
 * - Lookups by key are scoped to the organization; a project of another org is "not found".
 */

import type { DocumentStore, FindManyOptions, StoredDocument } from '../../../shared/store/document-store';
import type { Result } from '../../../shared/result/result';
import { parseDocument, type InvalidDocument } from '../../../shared/store/parse-document';
import { projectDocumentSchema, type ProjectDocument, type ProjectKey } from '../project.types';

export function parseProjectDocument(raw: StoredDocument): Result<ProjectDocument, InvalidDocument> {
  return parseDocument(projectDocumentSchema, raw, 'project_id');
}

export function getProject(store: DocumentStore, key: ProjectKey): Promise<StoredDocument | null> {
  return store.collection('projects').findOne({ project_id: key.projectId, org_id: key.orgId });
}

export function getProjectById(store: DocumentStore, projectId: string): Promise<StoredDocument | null> {
  return store.collection('projects').findOne({ project_id: projectId });
}

export async function isProjectNameTaken(
  store: DocumentStore,
  params: { orgId: string; name: string; exceptProjectId?: string },
): Promise<boolean> {
  const found = await store.collection('projects').findOne(
    params.exceptProjectId
      ? { org_id: params.orgId, name: params.name, project_id: { $ne: params.exceptProjectId } }
      : { org_id: params.orgId, name: params.name },
  );
  return found !== null;
}

export async function listProjects(
  store: DocumentStore,
  orgId: string,
  page: FindManyOptions,
): Promise<{ rows: StoredDocument[]; total: number }> {
  const projects = store.collection('projects');
  const filter = { org_id: orgId };
  const [total, rows] = await Promise.all([projects.count(filter), projects.findMany(filter, page)]);
  return { rows, total };
}
