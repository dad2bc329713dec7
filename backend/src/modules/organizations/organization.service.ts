/**
 * backend/src/modules/organizations/organization.service.ts
 *
 * WHY:
 * - Orchestrates organization CRUD and the "units of an organization" view.
 *
 * RULES:
 * - Every operation except create/list first resolves the caller's organization.
 * - Writes go through OrganizationRepo; reads through queries/.
 * - Stored records are parsed before they leave the service.
 */

import { randomUUID } from 'node:crypto';

import type { DocumentStore } from '../../shared/store/document-store';
import { DuplicateDocumentError } from '../../shared/store/store.errors';
import { parseDocuments } from '../../shared/store/parse-document';
import { FieldPatchBuilder } from '../../shared/patch/field-patch-builder';
import { buildPagination, DEFAULT_LIMIT, type PageRequest, type PaginationBlock } from '../../shared/http/pagination';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import type { Actor } from '../_shared/actor';
import { resolveCallerOrganization } from '../_shared/use-cases/resolve-caller-organization.usecase';
import {
  businessUnitDocumentSchema,
  getBusinessUnitsByIds,
  hasBusinessUnitsInOrganization,
  type BusinessUnitDocument,
} from '../business-units';

import type { OrganizationRepo } from './dal/organization.repo';
import {
  getOrganizationById,
  getOrganizationByName,
  isOrganizationNameTakenByOther,
  listOrganizations,
  parseOrganizationDocument,
} from './queries/organization.queries';
import { OrganizationErrors } from './organization.errors';
import type { CreateOrganizationInput, UpdateOrganizationInput } from './organization.schemas';
import {
  ACTIVE_ORGANIZATION_STATUS,
  organizationDocumentSchema,
  toOrganizationRef,
  type OrganizationDocument,
  type OrganizationRef,
} from './organization.types';

export type OrganizationList = {
  organizations: OrganizationDocument[];
  pagination: PaginationBlock;
};

export type OrganizationUnits = {
  business_units: BusinessUnitDocument[];
  pagination: PaginationBlock;
  organization: OrganizationRef;
};

const EMPTY_ADDRESS = { street: null, city: null, state: null, zip_code: null, country: null };

function buildAddress(address: CreateOrganizationInput['address']) {
  if (typeof address === 'string') return address;
  return { ...EMPTY_ADDRESS, ...address };
}

export class OrganizationService {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      logger: Logger;
      clock: Clock;
      organizationRepo: OrganizationRepo;
    },
  ) {}

  async createOrganization(actor: Actor, input: CreateOrganizationInput): Promise<OrganizationDocument> {
    const flow = 'organizations.create';
    const name = input.name?.trim() ?? '';
    if (!name) throw OrganizationErrors.missingName();

    const orgId = input.org_id?.trim() || randomUUID();

    this.deps.logger.info({
      msg: 'organizations.create.start',
      flow,
      requestId: actor.requestId,
      userId: actor.principal.userId,
      orgId,
    });

    if (await getOrganizationById(this.deps.store, orgId)) {
      throw OrganizationErrors.orgIdAlreadyExists({ orgId });
    }
    if (await getOrganizationByName(this.deps.store, name)) {
      throw OrganizationErrors.nameAlreadyExists();
    }

    const now = this.deps.clock().toISOString();
    const built = organizationDocumentSchema.safeParse({
      org_id: orgId,
      name,
      is_active: input.is_active ?? true,
      short_name: input.short_name || null,
      description: input.description || null,
      primary_contact: input.primary_contact || null,
      email: input.email || null,
      website: input.website || null,
      address: buildAddress(input.address),
      parent_org_id: input.parent_org_id || null,
      status: input.status || ACTIVE_ORGANIZATION_STATUS,
      business_units: input.business_units ?? [],
      members: input.members ?? [],
      projects: input.projects ?? [],
      established_date: input.established_date ?? null,
      created_at: now,
      updated_at: now,
      metadata: input.metadata ?? {},
    });
    if (!built.success) {
      this.deps.logger.error({ msg: 'organizations.create.model_error', flow, requestId: actor.requestId, orgId });
      throw OrganizationErrors.dataFormatError({ orgId });
    }
    const organization = built.data;

    try {
      await this.deps.organizationRepo.insertOrganization(organization);
    } catch (error) {
      if (error instanceof DuplicateDocumentError) throw OrganizationErrors.orgIdAlreadyExists({ orgId });
      throw error;
    }

    this.deps.logger.info({ msg: 'organizations.create.success', flow, requestId: actor.requestId, orgId });
    return organization;
  }

  async getOrganization(actor: Actor, orgId: string): Promise<OrganizationDocument> {
    await this.resolveCaller(actor, 'organizations.get');
    return this.loadOrganization(orgId);
  }

  async updateOrganization(
    actor: Actor,
    orgId: string,
    input: UpdateOrganizationInput,
  ): Promise<OrganizationDocument> {
    const flow = 'organizations.update';
    await this.resolveCaller(actor, flow);

    const raw = await getOrganizationById(this.deps.store, orgId);
    if (!raw) throw OrganizationErrors.organizationNotFound({ orgId });

    const name = input.name?.trim();
    if (name && (await isOrganizationNameTakenByOther(this.deps.store, name, orgId))) {
      throw OrganizationErrors.nameTakenByOther();
    }

    const patch = new FieldPatchBuilder(raw, 'organization')
      .field('name', name || null)
      .field('is_active', input.is_active)
      .field('short_name', input.short_name)
      .field('description', input.description)
      .field('primary_contact', input.primary_contact)
      .field('email', input.email)
      .field('website', input.website)
      .stringOrNested('address', input.address)
      .field('parent_org_id', input.parent_org_id)
      .field('status', input.status)
      .field('business_units', input.business_units)
      .field('members', input.members)
      .field('projects', input.projects)
      .field('established_date', input.established_date)
      .field('metadata', input.metadata)
      .build(this.deps.clock);
    if (!patch.ok) throw patch.error;

    const updated = await this.deps.organizationRepo.updateOrganization(orgId, patch.value);
    if (!updated) throw OrganizationErrors.organizationNotFound({ orgId });

    this.deps.logger.info({
      msg: 'organizations.update.success',
      flow,
      requestId: actor.requestId,
      orgId,
      fields: Object.keys(patch.value),
    });
    return this.loadOrganization(orgId);
  }

  async deleteOrganization(actor: Actor, orgId: string): Promise<void> {
    const flow = 'organizations.delete';
    await this.resolveCaller(actor, flow);

    if (!(await getOrganizationById(this.deps.store, orgId))) {
      throw OrganizationErrors.organizationNotFound({ orgId });
    }
    if (await hasBusinessUnitsInOrganization(this.deps.store, orgId)) {
      throw OrganizationErrors.hasDependencies({ orgId });
    }

    const deleted = await this.deps.organizationRepo.deleteOrganization(orgId);
    if (!deleted) throw OrganizationErrors.organizationNotFound({ orgId });

    this.deps.logger.info({ msg: 'organizations.delete.success', flow, requestId: actor.requestId, orgId });
  }

  async listOrganizations(actor: Actor, page: PageRequest): Promise<OrganizationList> {
    const { rows, total } = await listOrganizations(this.deps.store, page);

    const organizations = parseDocuments(organizationDocumentSchema, rows, 'org_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'organizations.list.invalid_record',
        flow: 'organizations.list',
        requestId: actor.requestId,
        orgId: invalid.id,
        issues: invalid.issues,
      });
    });

    return { organizations, pagination: buildPagination(page, organizations.length, total) };
  }

  async listOrganizationUnits(actor: Actor, orgId: string): Promise<OrganizationUnits> {
    const flow = 'organizations.units';
    await this.resolveCaller(actor, flow);

    const organization = await this.loadOrganization(orgId);
    const buIds = organization.business_units ?? [];

    const rows = await getBusinessUnitsByIds(this.deps.store, buIds);
    const units = parseDocuments(businessUnitDocumentSchema, rows, 'bu_id', (invalid) => {
      this.deps.logger.warn({
        msg: 'organizations.units.invalid_record',
        flow,
        requestId: actor.requestId,
        orgId,
        buId: invalid.id,
        issues: invalid.issues,
      });
    });

    const found = new Set(rows.map((row) => row.bu_id));
    const missing = buIds.filter((buId) => !found.has(buId));
    if (missing.length > 0) {
      this.deps.logger.warn({
        msg: 'organizations.units.missing_units',
        flow,
        requestId: actor.requestId,
        orgId,
        missing,
      });
    }

    const page = { limit: Math.max(DEFAULT_LIMIT, units.length), skip: 0 };
    return {
      business_units: units,
      pagination: buildPagination(page, units.length, units.length),
      organization: toOrganizationRef(organization),
    };
  }

  private resolveCaller(actor: Actor, flow: string) {
    return resolveCallerOrganization(this.deps, { ...actor, flow });
  }

  private async loadOrganization(orgId: string): Promise<OrganizationDocument> {
    const raw = await getOrganizationById(this.deps.store, orgId);
    if (!raw) throw OrganizationErrors.organizationNotFound({ orgId });

    const parsed = parseOrganizationDocument(raw);
    if (!parsed.ok) {
      this.deps.logger.error({ msg: 'organizations.corrupt_record', orgId, issues: parsed.error.issues });
      throw OrganizationErrors.dataFormatError({ orgId });
    }
    return parsed.value;
  }
}
