/**
 * backend/src/modules/projects/project.service.ts
 *
 * WHY:
 * - Project CRUD, scoped to the caller's organization.
 *
 * RULES:
 * - The caller's organization (resolved first, must be active) is the only org a
 *   project can be created in or read from.
 * - org.projects is maintained best-effort.
 */

import { randomUUID } from 'node:crypto';

import type { DocumentStore } from '../../shared/store/document-store';
import { DuplicateDocumentError } from '../../shared/store/store.errors';
import { parseDocuments } from '../../shared/store/parse-document';
import { FieldPatchBuilder } from '../../shared/patch/field-patch-builder';
import { buildPagination, type PageRequest, type PaginationBlock } from '../../shared/http/pagination';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import type { Actor } from '../_shared/actor';
import { bestEffort } from '../_shared/best-effort';
import { resolveCallerOrganization } from '../_shared/use-cases/resolve-caller-organization.usecase';
import type { OrganizationRepo } from '../organizations';
import { hasModulesInProject } from '../project-modules';

import type { ProjectRepo } from './dal/project.repo';
import {
  getProject,
  getProjectById,
  isProjectNameTaken,
  listProjects,
  parseProjectDocument,
} from './queries/project.queries';
import { ProjectErrors } from './project.errors';
import type { CreateProjectInput, UpdateProjectInput } from './project.schemas';
import {
  DEFAULT_PROJECT_STATUS,
  projectDocumentSchema,
  type ProjectDocument,
  type ProjectKey,
} from './project.types';

export type ProjectList = {
  projects: ProjectDocument[];
  pagination: PaginationBlock;
};

export class ProjectService {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      logger: Logger;
      clock: Clock;
      projectRepo: ProjectRepo;
      organizationRepo: OrganizationRepo;
    },
  ) {}

  async createProject(actor: Actor, input: CreateProjectInput): Promise<ProjectDocument> {
    const flow = 'projects.create';
    const orgId = await this.resolveCallerOrgId(actor, flow);

    const name = input.name?.trim() ?? '';
    if (!name) throw ProjectErrors.missingName();

    const projectId = input.project_id?.trim() || randomUUID();
    if (await getProjectById(this.deps.store, projectId)) {
      throw ProjectErrors.projectIdAlreadyExists({ projectId });
    }
    if (await isProjectNameTaken(this.deps.store, { orgId, name })) {
      throw ProjectErrors.nameAlreadyExists({ orgId });
    }

    const now = this.deps.clock().toISOString();
    const built = projectDocumentSchema.safeParse({
      project_id: projectId,
      name,
      description: input.description || null,
      status: input.status || DEFAULT_PROJECT_STATUS,
      owner: input.owner || null,
      parent_project_id: input.parent_project_id || null,
      org_id: orgId,
      start_date: input.start_date ?? null,
      due_date: input.due_date ?? null,
      completed_at: input.completed_at ?? null,
      modules: input.modules ?? [],
      members: input.members ?? [],
      tags: input.tags ?? [],
      budget: input.budget ?? null,
      priority: input.priority || null,
      created_at: now,
      updated_at: now,
      metadata: input.metadata ?? {},
    });
    if (!built.success) {
      this.deps.logger.error({ msg: 'projects.create.model_error', flow, requestId: actor.requestId, projectId });
      throw ProjectErrors.dataFormatError({ projectId });
    }
    const project = built.data;

    try {
      await this.deps.projectRepo.insertProject(project);
    } catch (error) {
      if (error instanceof DuplicateDocumentError) throw ProjectErrors.projectIdAlreadyExists({ projectId });
      throw error;
    }

    await bestEffort(
      this.deps.logger,
      { msg: 'projects.create.org_link_failed', flow, requestId: actor.requestId, orgId, projectId },
      () => this.deps.organizationRepo.addChild(orgId, 'projects', projectId),
    );

    this.deps.logger.info({ msg: 'projects.create.success', flow, requestId: actor.requestId, orgId, projectId });
    return project;
  }

  async getProject(actor: Actor, projectId: string): Promise<ProjectDocument> {
    const orgId = await this.resolveCallerOrgId(actor, 'projects.get');
    return this.loadProject({ orgId, projectId });
  }

  async updateProject(actor: Actor, projectId: string, input: UpdateProjectInput): Promise<ProjectDocument> {
    const flow = 'projects.update';
    const orgId = await this.resolveCallerOrgId(actor, flow);
    const key: ProjectKey = { orgId, projectId };

    const raw = await getProject(this.deps.store, key);
    if (!raw) throw ProjectErrors.projectNotFound(key);

    const name = input.name?.trim();
    if (name && (await isProjectNameTaken(this.deps.store, { orgId, name, exceptProjectId: projectId }))) {
      throw ProjectErrors.nameAlreadyExists(key);
    }

    const patch = new FieldPatchBuilder(raw, 'project')
      .field('name', name || null)
      .field('description', input.description)
      .field('status', input.status)
      .field('owner', input.owner)
      .field('parent_project_id', input.parent_project_id)
      .field('start_date', input.start_date)
      .field('due_date', input.due_date)
      .field('completed_at', input.completed_at)
      .field('modules', input.modules)
      .field('members', input.members)
      .field('tags', input.tags)
      .field('budget', input.budget)
      .field('priority', input.priority)
      .field('metadata', input.metadata)
      .build(this.deps.clock);
    if (!patch.ok) throw patch.error;

    const updated = await this.deps.projectRepo.updateProject(key, patch.value);
    if (!updated) throw ProjectErrors.projectNotFound(key);

    this.deps.logger.info({
      msg: 'projects.update.success',
      flow,
      requestId: actor.requestId,
      ...key,
      fields: Object.keys(patch.value),
    });
    return this.loadProject(key);
  }

  async deleteProject(actor: Actor, projectId: string): Promise<void> {
    const flow = 'projects.delete';
    const orgId = await this.resolveCallerOrgId(actor, flow);
    const key: ProjectKey = { orgId, projectId };

    if (!(await getProject(this.deps.store, key))) throw ProjectErrors.projectNotFound(key);
    if (await hasModulesInProject(this.deps.store, projectId)) throw ProjectErrors.hasDependencies(key);

    const deleted = await this.deps.projectRepo.deleteProject(key);
    if (!deleted) throw ProjectErrors.projectNotFound(key);

    await bestEffort(
      this.deps.logger,
      { msg: 'projects.delete.org_unlink_failed', flow, requestId: actor.requestId, ...key },
      () => this.deps.organizationRepo.removeChild(orgId, 'projects', projectId),
    );

    this.deps.logger.info({ msg: 'projects.delete.success', flow, requestId: actor.requestId, ...key });
  }

  async listProjects(actor: Actor, page: PageRequest): Promise<ProjectList> {
    const flow = 'projects.list';
    const orgId = await this.resolveCallerOrgId(actor, flow);

    const { rows, total } = await listProjects(this.deps.store, orgId, page);
    const projects = parseDocuments(projectDocumentSchema, rows, 'project_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'projects.list.invalid_record',
        flow,
        requestId: actor.requestId,
        orgId,
        projectId: invalid.id,
        issues: invalid.issues,
      });
    });

    return { projects, pagination: buildPagination(page, projects.length, total) };
  }

  private async resolveCallerOrgId(actor: Actor, flow: string): Promise<string> {
    const organization = await resolveCallerOrganization(this.deps, { ...actor, flow });
    return organization.org_id;
  }

  private async loadProject(key: ProjectKey): Promise<ProjectDocument> {
    const raw = await getProject(this.deps.store, key);
    if (!raw) throw ProjectErrors.projectNotFound(key);

    const parsed = parseProjectDocument(raw);
    if (!parsed.ok) {
      this.deps.logger.error({ msg: 'projects.corrupt_record', ...key, issues: parsed.error.issues });
      throw ProjectErrors.dataFormatError(key);
    }
    return parsed.value;
  }
}
