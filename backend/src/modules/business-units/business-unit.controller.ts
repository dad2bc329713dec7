/**
 * backend/src/modules/business-units/business-unit.controller.ts
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
import { orgIdParamsSchema } from '../organizations';

import type { BusinessUnitKey, BusinessUnitService } from './business-unit.service';
import {
  businessUnitParamsSchema,
  createBusinessUnitSchema,
  updateBusinessUnitSchema,
} from './business-unit.schemas';

function parseOrgId(req: FastifyRequest): string {
  const parsed = orgIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data.orgId;
}

function parseKey(req: FastifyRequest): BusinessUnitKey {
  const parsed = businessUnitParamsSchema.safeParse(req.params);
  if (!parsed.success) throw toValidationError(parsed.error, 'Invalid path parameters');
  return parsed.data;
}

export class BusinessUnitController {
  constructor(private readonly businessUnitService: BusinessUnitService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    const parsed = createBusinessUnitSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const unit = await this.businessUnitService.createBusinessUnit(actorFromRequest(req), orgId, parsed.data);
    return sendSuccess(reply, 201, 'Business unit created successfully', unit);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const unit = await this.businessUnitService.getBusinessUnit(actorFromRequest(req), parseKey(req));
    return sendSuccess(reply, 200, 'Business unit retrieved successfully', unit);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const key = parseKey(req);
    const parsed = updateBusinessUnitSchema.safeParse(req.body ?? {});
    if (!parsed.success) throw toValidationError(parsed.error);

    const unit = await this.businessUnitService.updateBusinessUnit(actorFromRequest(req), key, parsed.data);
    return sendSuccess(reply, 200, 'Business unit updated successfully', unit);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    await this.businessUnitService.deleteBusinessUnit(actorFromRequest(req), parseKey(req));
    return sendNoContent(reply);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const orgId = parseOrgId(req);
    const page = parsePageRequest(req.query);
    const result = await this.businessUnitService.listBusinessUnits(actorFromRequest(req), orgId, page);
    return sendSuccess(
      reply,
      200,
      `Business units retrieved successfully. Found ${result.business_units.length} business units.`,
      result,
    );
  }
}
