/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authenticated principal" logic.
 * - Narrows req.authContext.principal from `Principal | null` to `Principal`.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch the store, services, or token decoding.
 * - Routes that call this must run the `authenticate` preHandler first; reaching it
 *   with no principal means the route was wired without the guard, so we fail closed.
 */

import type { FastifyRequest } from 'fastify';
import type { Principal } from '../security/principal';
import { AccessErrors } from './access-errors';

export function requirePrincipal(req: FastifyRequest): Principal {
  const principal = req.authContext?.principal ?? null;
  if (!principal) {
    throw AccessErrors.invalidCredentials({ reason: 'missing_principal' });
  }
  return principal;
}
