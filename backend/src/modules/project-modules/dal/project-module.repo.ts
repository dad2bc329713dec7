/**
 * backend/src/modules/project-modules/dal/project-module.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for the `modules` collection.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { PatchSet } from '../../../shared/patch/field-patch-builder';
import type { ProjectModuleDocument, ProjectModuleKey } from '../project-module.types';

export class ProjectModuleRepo {
  constructor(private readonly store: DocumentStore) {}

  private get modules() {
    return this.store.collection('modules');
  }

  /** Throws DuplicateDocumentError when module_id is taken. */
  async insertModule(projectModule: ProjectModuleDocument): Promise<void> {
    await this.modules.insertOne(projectModule.module_id, { ...projectModule });
  }

  updateModule(key: ProjectModuleKey, set: PatchSet): Promise<boolean> {
    return this.modules.updateOne({ module_id: key.moduleId, project_id: key.projectId }, set);
  }

  deleteModule(key: ProjectModuleKey): Promise<boolean> {
    return this.modules.deleteOne({ module_id: key.moduleId, project_id: key.projectId });
  }
}
