/**
 * backend/src/modules/project-modules/project-module.types.ts
 *
 * WHY:
 * - Domain types for project modules (sub-parts of a project), stored in the
 *   `modules` collection.
 */

import { z } from 'zod';

const optionalText = z.string().nullable().default(null);
const idList = z.array(z.string()).nullable().default(null);

export const DEFAULT_MODULE_STATUS = 'not_started';

export const projectModuleDocumentSchema = z.object({
  module_id: z.string().min(1),
  name: optionalText,
  description: optionalText,
  status: optionalText,

  project_id: optionalText,
  owner: optionalText,

  start_date: optionalText,
  due_date: optionalText,
  completed_at: optionalText,

  members: idList,
  tags: idList,
  priority: optionalText,

  created_at: optionalText,
  updated_at: optionalText,

  metadata: z.record(z.unknown()).nullable().default(null),
});

export type ProjectModuleDocument = z.infer<typeof projectModuleDocumentSchema>;

export type ProjectModuleKey = Readonly<{ projectId: string; moduleId: string }>;
