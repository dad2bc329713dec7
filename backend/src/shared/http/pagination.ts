/**
 * backend/src/shared/http/pagination.ts
 *
 * WHY:
 * - Every list endpoint accepts `?limit=&skip=` with the same bounds and returns the
 *   same pagination block.
 *
 * RULES:
 * - limit: 1..1000, default 100 -> otherwise 400 INVALID_LIMIT
 * - skip:  >= 0,    default 0   -> otherwise 400 INVALID_SKIP
 */

import { z } from 'zod';
import { AppError } from './errors';

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 1000;

export type PageRequest = Readonly<{ limit: number; skip: number }>;

export type PaginationBlock = {
  total_count: number;
  returned_count: number;
  limit: number;
  skip: number;
  has_more: boolean;
};

const intParam = z.coerce.number().int();

const paginationQuerySchema = z.object({
  limit: z.unknown().optional(),
  skip: z.unknown().optional(),
});

function readInt(raw: unknown, fallback: number): number | null {
  if (raw === undefined || raw === '') return fallback;
  const parsed = intParam.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function parsePageRequest(query: unknown): PageRequest {
  const parsed = paginationQuerySchema.safeParse(query ?? {});
  const raw = parsed.success ? parsed.data : {};

  const limit = readInt(raw.limit, DEFAULT_LIMIT);
  if (limit === null || limit < 1 || limit > MAX_LIMIT) {
    throw AppError.badRequest('INVALID_LIMIT', 'Invalid limit parameter', {
      detail: `Limit must be between 1 and ${MAX_LIMIT}`,
      field: 'limit',
    });
  }

  const skip = readInt(raw.skip, 0);
  if (skip === null || skip < 0) {
    throw AppError.badRequest('INVALID_SKIP', 'Invalid skip parameter', {
      detail: 'Skip must be 0 or greater',
      field: 'skip',
    });
  }

  return { limit, skip };
}

export function buildPagination(page: PageRequest, returnedCount: number, totalCount: number): PaginationBlock {
  return {
    total_count: totalCount,
    returned_count: returnedCount,
    limit: page.limit,
    skip: page.skip,
    has_more: page.skip + returnedCount < totalCount,
  };
}
