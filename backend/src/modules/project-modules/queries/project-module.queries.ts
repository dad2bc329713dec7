/**
 * backend/src/modules/project-modules/queries/project-module.queries.ts
 *
 * RULES:
 * - Read-only. No AppError.
 */

import type { DocumentStore, FindManyOptions, StoredDocument } from '../../../shared/store/document-store';
import type { Result } from '../../../shared/result/result';
import { parseDocument, type InvalidDocument } from '../../../shared/store/parse-document';
import {
  projectModuleDocumentSchema,
  type ProjectModuleDocument,
  type ProjectModuleKey,
} from '../project-module.types';

export function parseProjectModuleDocument(
  raw: StoredDocument,
): Result<ProjectModuleDocument, InvalidDocument> {
  return parseDocument(projectModuleDocumentSchema, raw, 'module_id');
}

export function getProjectModule(store: DocumentStore, key: ProjectModuleKey): Promise<StoredDocument | null> {
  return store.collection('modules').findOne({ module_id: key.moduleId, project_id: key.projectId });
}

export function getProjectModuleById(store: DocumentStore, moduleId: string): Promise<StoredDocument | null> {
  return store.collection('modules').findOne({ module_id: moduleId });
}

export async function isModuleNameTaken(
  store: DocumentStore,
  params: { projectId: string; name: string; exceptModuleId?: string },
): Promise<boolean> {
  const found = await store.collection('modules').findOne(
    params.exceptModuleId
      ? { project_id: params.projectId, name: params.name, module_id: { $ne: params.exceptModuleId } }
      : { project_id: params.projectId, name: params.name },
  );
  return found !== null;
}

export async function hasModulesInProject(store: DocumentStore, projectId: string): Promise<boolean> {
  return (await store.collection('modules').count({ project_id: projectId })) > 0;
}

export async function listProjectModules(
  store: DocumentStore,
  projectId: string,
  page: FindManyOptions,
): Promise<{ rows: StoredDocument[]; total: number }> {
  const modules = store.collection('modules');
  const filter = { project_id: projectId };
  const [total, rows] = await Promise.all([modules.count(filter), modules.findMany(filter, page)]);
  return { rows, total };
}
