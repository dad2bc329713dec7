/**
 * backend/src/modules/project-modules/project-module.schemas.ts
 *
 * WHY:
 * - Request validation for /projects/:projectId/modules.
 * - `project_id` comes from the route.
 */

import { z } from 'zod';

const text = z.string().trim().nullish();
const date = z.string().date().nullish();

const projectModuleFields = {
  name: text,
  description: text,
  status: text,
  owner: text,
  start_date: date,
  due_date: date,
  completed_at: z.string().datetime({ offset: true }).nullish(),
  members: z.array(z.string().trim().min(1)).nullish(),
  tags: z.array(z.string().trim()).nullish(),
  priority: text,
  metadata: z.record(z.unknown()).nullish(),
};

export const createProjectModuleSchema = z
  .object({
    module_id: z.string().trim().min(1).nullish(),
    ...projectModuleFields,
  })
  .strict();

export const updateProjectModuleSchema = z.object(projectModuleFields).strict();

export const projectModuleParamsSchema = z.object({
  projectId: z.string().trim().min(1),
  moduleId: z.string().trim().min(1),
});

export type CreateProjectModuleInput = z.infer<typeof createProjectModuleSchema>;
export type UpdateProjectModuleInput = z.infer<typeof updateProjectModuleSchema>;
