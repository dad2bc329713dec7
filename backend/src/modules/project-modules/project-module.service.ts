/**
 * backend/src/modules/project-modules/project-module.service.ts
 *
 * WHY:
 * - Module CRUD under /projects/:projectId/modules.
 *
 * RULES:
 * - The parent project must exist in the caller's organization; otherwise every
 *   operation is PROJECT_NOT_FOUND, even if a module with that id exists.
 * - project.modules is maintained best-effort.
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
import { getProject, ProjectErrors, type ProjectRepo } from '../projects';

import type { ProjectModuleRepo } from './dal/project-module.repo';
import {
  getProjectModule,
  getProjectModuleById,
  isModuleNameTaken,
  listProjectModules,
  parseProjectModuleDocument,
} from './queries/project-module.queries';
import { ProjectModuleErrors } from './project-module.errors';
import type { CreateProjectModuleInput, UpdateProjectModuleInput } from './project-module.schemas';
import {
  DEFAULT_MODULE_STATUS,
  projectModuleDocumentSchema,
  type ProjectModuleDocument,
  type ProjectModuleKey,
} from './project-module.types';

export type ProjectModuleList = {
  modules: ProjectModuleDocument[];
  pagination: PaginationBlock;
};

export class ProjectModuleService {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      logger: Logger;
      clock: Clock;
      projectModuleRepo: ProjectModuleRepo;
      projectRepo: ProjectRepo;
    },
  ) {}

  async createModule(
    actor: Actor,
    projectId: string,
    input: CreateProjectModuleInput,
  ): Promise<ProjectModuleDocument> {
    const flow = 'modules.create';
    await this.resolveParentProject(actor, projectId, flow);

    const name = input.name?.trim() ?? '';
    if (!name) throw ProjectModuleErrors.missingName();

    const moduleId = input.module_id?.trim() || randomUUID();
    if (await getProjectModuleById(this.deps.store, moduleId)) {
      throw ProjectModuleErrors.moduleIdAlreadyExists({ moduleId });
    }
    if (await isModuleNameTaken(this.deps.store, { projectId, name })) {
      throw ProjectModuleErrors.nameAlreadyExists({ projectId });
    }

    const now = this.deps.clock().toISOString();
    const built = projectModuleDocumentSchema.safeParse({
      module_id: moduleId,
      name,
      description: input.description || null,
      status: input.status || DEFAULT_MODULE_STATUS,
      project_id: projectId,
      owner: input.owner || null,
      start_date: input.start_date ?? null,
      due_date: input.due_date ?? null,
      completed_at: input.completed_at ?? null,
      members: input.members ?? [],
      tags: input.tags ?? [],
      priority: input.priority || null,
      created_at: now,
      updated_at: now,
      metadata: input.metadata ?? {},
    });
    if (!built.success) {
      this.deps.logger.error({ msg: 'modules.create.model_error', flow, requestId: actor.requestId, moduleId });
      throw ProjectModuleErrors.dataFormatError({ moduleId });
    }
    const projectModule = built.data;

    try {
      await this.deps.projectModuleRepo.insertModule(projectModule);
    } catch (error) {
      if (error instanceof DuplicateDocumentError) throw ProjectModuleErrors.moduleIdAlreadyExists({ moduleId });
      throw error;
    }

    await bestEffort(
      this.deps.logger,
      { msg: 'modules.create.project_link_failed', flow, requestId: actor.requestId, projectId, moduleId },
      () => this.deps.projectRepo.addModule(projectId, moduleId),
    );

    this.deps.logger.info({ msg: 'modules.create.success', flow, requestId: actor.requestId, projectId, moduleId });
    return projectModule;
  }

  async getModule(actor: Actor, key: ProjectModuleKey): Promise<ProjectModuleDocument> {
    await this.resolveParentProject(actor, key.projectId, 'modules.get');
    return this.loadModule(key);
  }

  async updateModule(
    actor: Actor,
    key: ProjectModuleKey,
    input: UpdateProjectModuleInput,
  ): Promise<ProjectModuleDocument> {
    const flow = 'modules.update';
    await this.resolveParentProject(actor, key.projectId, flow);

    const raw = await getProjectModule(this.deps.store, key);
    if (!raw) throw ProjectModuleErrors.moduleNotFound(key);

    const name = input.name?.trim();
    if (
      name &&
      (await isModuleNameTaken(this.deps.store, { projectId: key.projectId, name, exceptModuleId: key.moduleId }))
    ) {
      throw ProjectModuleErrors.nameAlreadyExists(key);
    }

    const patch = new FieldPatchBuilder(raw, 'module')
      .field('name', name || null)
      .field('description', input.description)
      .field('status', input.status)
      .field('owner', input.owner)
      .field('start_date', input.start_date)
      .field('due_date', input.due_date)
      .field('completed_at', input.completed_at)
      .field('members', input.members)
      .field('tags', input.tags)
      .field('priority', input.priority)
      .field('metadata', input.metadata)
      .build(this.deps.clock);
    if (!patch.ok) throw patch.error;

    const updated = await this.deps.projectModuleRepo.updateModule(key, patch.value);
    if (!updated) throw ProjectModuleErrors.moduleNotFound(key);

    this.deps.logger.info({
      msg: 'modules.update.success',
      flow,
      requestId: actor.requestId,
      ...key,
      fields: Object.keys(patch.value),
    });
    return this.loadModule(key);
  }

  async deleteModule(actor: Actor, key: ProjectModuleKey): Promise<void> {
    const flow = 'modules.delete';
    await this.resolveParentProject(actor, key.projectId, flow);

    const deleted = await this.deps.projectModuleRepo.deleteModule(key);
    if (!deleted) throw ProjectModuleErrors.moduleNotFound(key);

    await bestEffort(
      this.deps.logger,
      { msg: 'modules.delete.project_unlink_failed', flow, requestId: actor.requestId, ...key },
      () => this.deps.projectRepo.removeModule(key.projectId, key.moduleId),
    );

    this.deps.logger.info({ msg: 'modules.delete.success', flow, requestId: actor.requestId, ...key });
  }

  async listModules(actor: Actor, projectId: string, page: PageRequest): Promise<ProjectModuleList> {
    const flow = 'modules.list';
    await this.resolveParentProject(actor, projectId, flow);

    const { rows, total } = await listProjectModules(this.deps.store, projectId, page);
    const modules = parseDocuments(projectModuleDocumentSchema, rows, 'module_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'modules.list.invalid_record',
        flow,
        requestId: actor.requestId,
        projectId,
        moduleId: invalid.id,
        issues: invalid.issues,
      });
    });

    return { modules, pagination: buildPagination(page, modules.length, total) };
  }

  private async resolveParentProject(actor: Actor, projectId: string, flow: string): Promise<void> {
    const organization = await resolveCallerOrganization(this.deps, { ...actor, flow });
    const key = { orgId: organization.org_id, projectId };

    if (!(await getProject(this.deps.store, key))) {
      throw ProjectErrors.projectNotFound(key);
    }
  }

  private async loadModule(key: ProjectModuleKey): Promise<ProjectModuleDocument> {
    const raw = await getProjectModule(this.deps.store, key);
    if (!raw) throw ProjectModuleErrors.moduleNotFound(key);

    const parsed = parseProjectModuleDocument(raw);
    if (!parsed.ok) {
      this.deps.logger.error({ msg: 'modules.corrupt_record', ...key, issues: parsed.error.issues });
      throw ProjectModuleErrors.dataFormatError(key);
    }
    return parsed.value;
  }
}
