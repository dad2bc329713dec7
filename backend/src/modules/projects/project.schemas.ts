/**
 * backend/src/modules/projects/project.schemas.ts
 *
 * WHY:
 * - Request validation for /projects.
 * - `org_id` is never taken from the body: a project lives in the caller's organization.
 */

import { z } from 'zod';

const text = z.string().trim().nullish();
const idList = z.array(z.string().trim().min(1)).nullish();
const date = z.string().date().nullish();
const timestamp = z.string().datetime({ offset: true }).nullish();

const projectFields = {
  name: text,
  description: text,
  status: text,
  owner: text,
  parent_project_id: text,
  start_date: date,
  due_date: date,
  completed_at: timestamp,
  modules: idList,
  members: idList,
  tags: z.array(z.string().trim()).nullish(),
  budget: z.number().nonnegative().nullish(),
  priority: text,
  metadata: z.record(z.unknown()).nullish(),
};

export const createProjectSchema = z
  .object({
    project_id: z.string().trim().min(1).nullish(),
    ...projectFields,
  })
  .strict();

export const updateProjectSchema = z.object(projectFields).strict();

export const projectIdParamsSchema = z.object({
  projectId: z.string().trim().min(1),
});

export type CreateProjectInput = z.infer<typeof createProjectSchema>;
export type UpdateProjectInput = z.infer<typeof updateProjectSchema>;
