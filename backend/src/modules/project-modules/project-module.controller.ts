/**
 * backend/src/modules/project-modules/project-module.controller.ts
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendNoContent, sendSuccess } from '../../shared/http/envelope';
import { parsePageRequest } from '../../shared/http/pagination';
import { toValidationError } from '../../shared/http/validation';
import { actorFromRequest } from '../_shared/actor';
import { projectIdParamsSchema } from '../projects';

import type { ProjectModuleService } from './project-module.service';
import {
  createProjectModuleSchema,
  projectModuleParamsSchema,
  updateProjectModuleSchema,
} from './project-module.schemas';
import type { ProjectModuleKey } from './project-module.types';

function parseProjectId(req: FastifyRequest): string {
  const parsed = projectIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data.projectId;
}

function parseKey(req: FastifyRequest): ProjectModuleKey {
  const parsed = projectModuleParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data;
}

export class ProjectModuleController {
  constructor(private readonly projectModuleService: ProjectModuleService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const projectId = parseProjectId(req);
    const parsed = createProjectModuleSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const created = await this.projectModuleService.createModule(actorFromRequest(req), projectId, parsed.data);
    return sendSuccess(reply, 201, 'Module created successfully', created);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const found = await this.projectModuleService.getModule(actorFromRequest(req), parseKey(req));
    return sendSuccess(reply, 200, 'Module retrieved successfully', found);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const key = parseKey(req);
    const parsed = updateProjectModuleSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const updated = await this.projectModuleService.updateModule(actorFromRequest(req), key, parsed.data);
    return sendSuccess(reply, 200, 'Module updated successfully', updated);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    await this.projectModuleService.deleteModule(actorFromRequest(req), parseKey(req));
    return sendNoContent(reply);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const projectId = parseProjectId(req);
    const page = parsePageRequest(req.query);
    const result = await this.projectModuleService.listModules(actorFromRequest(req), projectId, page);
    return sendSuccess(reply, 200, `Modules retrieved successfully. Found ${result.modules.length} modules.`, result);
  }
}
