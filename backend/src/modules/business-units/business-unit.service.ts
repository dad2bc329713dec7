/**
 * backend/src/modules/business-units/business-unit.service.ts
 *
 * WHY:
 * - Business unit CRUD under /organizations/:orgId/business-units.
 *
 * RULES:
 * - Every operation resolves the caller's organization first.
 * - The owning organization's `business_units` list is bookkeeping: it is updated
 *   best-effort after the unit itself is written or deleted.
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
import { getOrganizationById, OrganizationErrors, type OrganizationRepo } from '../organizations';

import type { BusinessUnitRepo } from './dal/business-unit.repo';
import {
  getBusinessUnit,
  getBusinessUnitById,
  hasChildBusinessUnits,
  isBusinessUnitNameTaken,
  listBusinessUnits,
  parseBusinessUnitDocument,
} from './queries/business-unit.queries';
import { BusinessUnitErrors } from './business-unit.errors';
import type { CreateBusinessUnitInput, UpdateBusinessUnitInput } from './business-unit.schemas';
import {
  businessUnitDocumentSchema,
  DEFAULT_BUSINESS_UNIT_STATUS,
  type BusinessUnitDocument,
} from './business-unit.types';

export type BusinessUnitKey = Readonly<{ orgId: string; buId: string }>;

export type BusinessUnitList = {
  business_units: BusinessUnitDocument[];
  pagination: PaginationBlock;
};

export class BusinessUnitService {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      logger: Logger;
      clock: Clock;
      businessUnitRepo: BusinessUnitRepo;
      organizationRepo: OrganizationRepo;
    },
  ) {}

  async createBusinessUnit(
    actor: Actor,
    orgId: string,
    input: CreateBusinessUnitInput,
  ): Promise<BusinessUnitDocument> {
    const flow = 'business_units.create';
    await this.resolveCaller(actor, flow);

    const name = input.name?.trim() ?? '';
    if (!name) throw BusinessUnitErrors.missingName();

    await this.assertOrganizationExists(orgId);

    const buId = input.bu_id?.trim() || randomUUID();
    if (await getBusinessUnitById(this.deps.store, buId)) {
      throw BusinessUnitErrors.buIdAlreadyExists({ buId });
    }
    if (await isBusinessUnitNameTaken(this.deps.store, { orgId, name })) {
      throw BusinessUnitErrors.nameAlreadyExists({ orgId });
    }

    const now = this.deps.clock().toISOString();
    const built = businessUnitDocumentSchema.safeParse({
      bu_id: buId,
      name,
      description: input.description || null,
      parent_org: orgId,
      parent_bu_id: input.parent_bu_id || null,
      head: input.head || null,
      members: input.members ?? [],
      projects: input.projects ?? [],
      status: input.status || DEFAULT_BUSINESS_UNIT_STATUS,
      created_at: now,
      updated_at: now,
      metadata: input.metadata ?? {},
    });
    if (!built.success) {
      this.deps.logger.error({ msg: 'business_units.create.model_error', flow, requestId: actor.requestId, buId });
      throw BusinessUnitErrors.dataFormatError({ buId });
    }
    const unit = built.data;

    try {
      await this.deps.businessUnitRepo.insertBusinessUnit(unit);
    } catch (error) {
      if (error instanceof DuplicateDocumentError) throw BusinessUnitErrors.buIdAlreadyExists({ buId });
      throw error;
    }

    await bestEffort(
      this.deps.logger,
      { msg: 'business_units.create.org_link_failed', flow, requestId: actor.requestId, orgId, buId },
      () => this.deps.organizationRepo.addChild(orgId, 'business_units', buId),
    );

    this.deps.logger.info({ msg: 'business_units.create.success', flow, requestId: actor.requestId, orgId, buId });
    return unit;
  }

  async getBusinessUnit(actor: Actor, key: BusinessUnitKey): Promise<BusinessUnitDocument> {
    await this.resolveCaller(actor, 'business_units.get');
    return this.loadBusinessUnit(key);
  }

  async updateBusinessUnit(
    actor: Actor,
    key: BusinessUnitKey,
    input: UpdateBusinessUnitInput,
  ): Promise<BusinessUnitDocument> {
    const flow = 'business_units.update';
    await this.resolveCaller(actor, flow);

    const raw = await getBusinessUnit(this.deps.store, key);
    if (!raw) throw BusinessUnitErrors.businessUnitNotFound(key);

    const name = input.name?.trim();
    if (name && (await isBusinessUnitNameTaken(this.deps.store, { orgId: key.orgId, name, exceptBuId: key.buId }))) {
      throw BusinessUnitErrors.nameAlreadyExists(key);
    }

    const patch = new FieldPatchBuilder(raw, 'business_unit')
      .field('name', name || null)
      .field('description', input.description)
      .field('parent_bu_id', input.parent_bu_id)
      .field('head', input.head)
      .field('members', input.members)
      .field('projects', input.projects)
      .field('status', input.status)
      .field('metadata', input.metadata)
      .build(this.deps.clock);
    if (!patch.ok) throw patch.error;

    const updated = await this.deps.businessUnitRepo.updateBusinessUnit(key, patch.value);
    if (!updated) throw BusinessUnitErrors.businessUnitNotFound(key);

    this.deps.logger.info({
      msg: 'business_units.update.success',
      flow,
      requestId: actor.requestId,
      ...key,
      fields: Object.keys(patch.value),
    });
    return this.loadBusinessUnit(key);
  }

  async deleteBusinessUnit(actor: Actor, key: BusinessUnitKey): Promise<void> {
    const flow = 'business_units.delete';
    await this.resolveCaller(actor, flow);

    if (!(await getBusinessUnit(this.deps.store, key))) {
      throw BusinessUnitErrors.businessUnitNotFound(key);
    }
    if (await hasChildBusinessUnits(this.deps.store, key)) {
      throw BusinessUnitErrors.hasDependencies(key);
    }

    const deleted = await this.deps.businessUnitRepo.deleteBusinessUnit(key);
    if (!deleted) throw BusinessUnitErrors.businessUnitNotFound(key);

    await bestEffort(
      this.deps.logger,
      { msg: 'business_units.delete.org_unlink_failed', flow, requestId: actor.requestId, ...key },
      () => this.deps.organizationRepo.removeChild(key.orgId, 'business_units', key.buId),
    );

    this.deps.logger.info({ msg: 'business_units.delete.success', flow, requestId: actor.requestId, ...key });
  }

  async listBusinessUnits(actor: Actor, orgId: string, page: PageRequest): Promise<BusinessUnitList> {
    const flow = 'business_units.list';
    await this.resolveCaller(actor, flow);
    await this.assertOrganizationExists(orgId);

    const { rows, total } = await listBusinessUnits(this.deps.store, orgId, page);
    const units = parseDocuments(businessUnitDocumentSchema, rows, 'bu_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'business_units.list.invalid_record',
        flow,
        requestId: actor.requestId,
        orgId,
        buId: invalid.id,
        issues: invalid.issues,
      });
    });

    return { business_units: units, pagination: buildPagination(page, units.length, total) };
  }

  private resolveCaller(actor: Actor, flow: string) {
    return resolveCallerOrganization(this.deps, { ...actor, flow });
  }

  private async assertOrganizationExists(orgId: string): Promise<void> {
    if (!(await getOrganizationById(this.deps.store, orgId))) {
      throw OrganizationErrors.parentOrganizationNotFound({ orgId });
    }
  }

  private async loadBusinessUnit(key: BusinessUnitKey): Promise<BusinessUnitDocument> {
    const raw = await getBusinessUnit(this.deps.store, key);
    if (!raw) throw BusinessUnitErrors.businessUnitNotFound(key);

    const parsed = parseBusinessUnitDocument(raw);
    if (!parsed.ok) {
      this.deps.logger.error({ msg: 'business_units.corrupt_record', ...key, issues: parsed.error.issues });
      throw BusinessUnitErrors.dataFormatError(key);
    }
    return parsed.value;
  }
}
