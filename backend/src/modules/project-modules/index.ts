/**
 * backend/src/modules/project-modules/index.ts
 *
 * WHY:
 * - Public surface of the project-modules module.
 */

export { hasModulesInProject } from './queries/project-module.queries';
