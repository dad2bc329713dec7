/**
 * backend/src/shared/http/access-guards.ts
 *
 * WHY:
 * - preHandler factories wrapping the pure predicates in shared/security/access-predicates.ts.
 * - Always listed AFTER guard.authenticate in a route's preHandler array.
 *
 * HOW TO USE:
 *   app.post('/organizations', { preHandler: [guard.authenticate, requireAdmin()] }, handler)
 *   app.get('/organizations/:orgId/reports', {
 *     preHandler: [guard.authenticate, requireOrgAndRoles(orgIdFromParams, ['manager'])],
 *   }, handler)
 *
 * RULES:
 * - Every rejection is the same 403 (AccessErrors.insufficientPermissions).
 */

import type { FastifyRequest } from 'fastify';
import type { Principal } from '../security/principal';
import type { Result } from '../result/result';
import {
  checkAdmin,
  checkBusinessUnits,
  checkOrgAndRoles,
  checkOrganization,
  checkRoles,
  type AccessDenied,
} from '../security/access-predicates';
import { withRequestContext } from '../logger/with-context';
import { AccessErrors } from './access-errors';
import { requirePrincipal } from './require-auth-context';
import type { PreHandler } from './auth-guard';

/** A fixed value, or one read from the request (usually a route param). */
export type RequestValue<T> = T | ((req: FastifyRequest) => T);

function guardWith(
  check: (principal: Principal, req: FastifyRequest) => Result<Principal, AccessDenied>,
): PreHandler {
  return async (req: FastifyRequest) => {
    const principal = requirePrincipal(req);
    const result = check(principal, req);

    if (!result.ok) {
      withRequestContext(req).warn('auth.access.denied', {
        flow: 'auth.access',
        reason: result.error.reason,
      });
      throw AccessErrors.insufficientPermissions({ reason: result.error.reason });
    }
  };
}

export function requireRoles(roles: readonly string[]): PreHandler {
  return guardWith((principal) => checkRoles(principal, roles));
}

export function requireOrganization(orgId: RequestValue<string>): PreHandler {
  return guardWith((principal, req) => {
    const required = typeof orgId === 'function' ? orgId(req) : orgId;
    return checkOrganization(principal, required);
  });
}

export function requireBusinessUnits(buIds: RequestValue<readonly string[]>): PreHandler {
  return guardWith((principal, req) => {
    const required = typeof buIds === 'function' ? buIds(req) : buIds;
    return checkBusinessUnits(principal, required);
  });
}

export function requireOrgAndRoles(orgId: RequestValue<string>, roles: readonly string[]): PreHandler {
  return guardWith((principal, req) => {
    const required = typeof orgId === 'function' ? orgId(req) : orgId;
    return checkOrgAndRoles(principal, required, roles);
  });
}

export function requireAdmin(): PreHandler {
  return guardWith((principal) => checkAdmin(principal));
}
