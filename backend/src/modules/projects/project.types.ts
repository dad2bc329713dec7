/**
 * backend/src/modules/projects/project.types.ts
 *
 * WHY:
 * - Domain types for projects. A project always belongs to exactly one organization
 *   (`org_id`) and is only visible to callers of that organization.
 */

import { z } from 'zod';

const optionalText = z.string().nullable().default(null);
const idList = z.array(z.string()).nullable().default(null);

export const DEFAULT_PROJECT_STATUS = 'planning';

export const projectDocumentSchema = z.object({
  project_id: z.string().min(1),
  name: optionalText,
  description: optionalText,
  status: optionalText,

  owner: optionalText,
  parent_project_id: optionalText,
  org_id: optionalText,

  start_date: optionalText,
  due_date: optionalText,
  completed_at: optionalText,

  modules: idList,
  members: idList,
  tags: idList,

  budget: z.number().nullable().default(null),
  priority: optionalText,

  created_at: optionalText,
  updated_at: optionalText,

  metadata: z.record(z.unknown()).nullable().default(null),
});

export type ProjectDocument = z.infer<typeof projectDocumentSchema>;

export type ProjectKey = Readonly<{ orgId: string; projectId: string }>;
