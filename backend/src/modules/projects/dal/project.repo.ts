/**
 * backend/src/modules/projects/dal/project.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for projects, including the `modules` reverse-reference list.
 *
 * RULES:
 * - No AppError.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { PatchSet } from '../../../shared/patch/field-patch-builder';
import type { ProjectDocument, ProjectKey } from '../project.types';

export class ProjectRepo {
  constructor(private readonly store: DocumentStore) {}

  private get projects() {
    return this.store.collection('projects');
  }

  /** Throws DuplicateDocumentError when project_id is taken. */
  async insertProject(project: ProjectDocument): Promise<void> {
    await this.projects.insertOne(project.project_id, { ...project });
  }

  updateProject(key: ProjectKey, set: PatchSet): Promise<boolean> {
    return this.projects.updateOne({ project_id: key.projectId, org_id: key.orgId }, set);
  }

  deleteProject(key: ProjectKey): Promise<boolean> {
    return this.projects.deleteOne({ project_id: key.projectId, org_id: key.orgId });
  }

  addModule(projectId: string, moduleId: string): Promise<boolean> {
    return this.projects.addToSet({ project_id: projectId }, 'modules', moduleId);
  }

  removeModule(projectId: string, moduleId: string): Promise<boolean> {
    return this.projects.pull({ project_id: projectId }, 'modules', moduleId);
  }
}
