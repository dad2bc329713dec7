/**
 * backend/src/modules/projects/index.ts
 *
 * WHY:
 * - Public surface of the projects module. Project modules resolve their parent
 *   project and maintain its `modules` list through here.
 */

export { getProject, parseProjectDocument } from './queries/project.queries';
export type { ProjectRepo } from './dal/project.repo';
export { ProjectErrors } from './project.errors';
export { projectIdParamsSchema } from './project.schemas';
export type { ProjectDocument, ProjectKey } from './project.types';
