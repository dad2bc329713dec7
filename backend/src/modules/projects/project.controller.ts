/**
 * backend/src/modules/projects/project.controller.ts
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendNoContent, sendSuccess } from '../../shared/http/envelope';
import { parsePageRequest } from '../../shared/http/pagination';
import { toValidationError } from '../../shared/http/validation';
import { actorFromRequest } from '../_shared/actor';

import type { ProjectService } from './project.service';
import { createProjectSchema, projectIdParamsSchema, updateProjectSchema } from './project.schemas';

function parseProjectId(req: FastifyRequest): string {
  const parsed = projectIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data.projectId;
}

export class ProjectController {
  constructor(private readonly projectService: ProjectService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createProjectSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const project = await this.projectService.createProject(actorFromRequest(req), parsed.data);
    return sendSuccess(reply, 201, 'Project created successfully', project);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const project = await this.projectService.getProject(actorFromRequest(req), parseProjectId(req));
    return sendSuccess(reply, 200, 'Project retrieved successfully', project);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const projectId = parseProjectId(req);
    const parsed = updateProjectSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const project = await this.projectService.updateProject(actorFromRequest(req), projectId, parsed.data);
    return sendSuccess(reply, 200, 'Project updated successfully', project);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    await this.projectService.deleteProject(actorFromRequest(req), parseProjectId(req));
    return sendNoContent(reply);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const page = parsePageRequest(req.query);
    const result = await this.projectService.listProjects(actorFromRequest(req), page);
    return sendSuccess(
      reply,
      200,
      `Projects retrieved successfully. Found ${result.projects.length} projects.`,
      result,
    );
  }
}
