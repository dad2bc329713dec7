/**
 * backend/src/modules/organizations/organization.controller.ts
 *
 * WHY:
 * - Maps HTTP -> OrganizationService.
 *
 * RULES:
 * - No store access here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { sendNoContent, sendSuccess } from '../../shared/http/envelope';
import { parsePageRequest } from '../../shared/http/pagination';
import { toValidationError } from '../../shared/http/validation';
import { actorFromRequest } from '../_shared/actor';

import type { OrganizationService } from './organization.service';
import { createOrganizationSchema, orgIdParamsSchema, updateOrganizationSchema } from './organization.schemas';

function parseOrgId(req: FastifyRequest): string {
  const parsed = orgIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data.orgId;
}

export class OrganizationController {
  constructor(private readonly organizationService: OrganizationService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createOrganizationSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const organization = await this.organizationService.createOrganization(actorFromRequest(req), parsed.data);
    return sendSuccess(reply, 201, 'Organization created successfully', organization);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    const organization = await this.organizationService.getOrganization(actorFromRequest(req), orgId);
    return sendSuccess(reply, 200, 'Organization retrieved successfully', organization);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    const parsed = updateOrganizationSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const organization = await this.organizationService.updateOrganization(
      actorFromRequest(req),
      orgId,
      parsed.data,
    );
    return sendSuccess(reply, 200, 'Organization updated successfully', organization);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    await this.organizationService.deleteOrganization(actorFromRequest(req), orgId);
    return sendNoContent(reply);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const page = parsePageRequest(req.query);
    const result = await this.organizationService.listOrganizations(actorFromRequest(req), page);
    return sendSuccess(
      reply,
      200,
      `Organizations retrieved successfully. Found ${result.organizations.length} organizations.`,
      result,
    );
  }

  async units(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    const result = await this.organizationService.listOrganizationUnits(actorFromRequest(req), orgId);
    return sendSuccess(
      reply,
      200,
      `Organization units retrieved successfully. Found ${result.business_units.length} business units.`,
      result,
    );
  }
}
