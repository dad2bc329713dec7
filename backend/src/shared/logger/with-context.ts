/**
 * backend/src/shared/logger/with-context.ts
 *
 * Child logger bound to the current request: requestId, host and, once the bearer
 * guard has run, the caller's id, organization and roles.
 *
 *   withRequestContext(req).warn('auth.access.denied', { flow: 'auth.access', reason })
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  const principal = req.authContext?.principal ?? null;

  return logger.child({
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
    userId: principal?.userId ?? null,
    orgId: principal?.orgId ?? null,
    roles: principal?.roles ?? null,
  });
}
