/**
 * src/modules/_shared/actor.ts
 *
 * Who is performing an admin operation: the authenticated principal plus the
 * request id used to correlate the service's log lines with the HTTP request.
 */

import type { FastifyRequest } from 'fastify';
import type { Principal } from '../../shared/security/principal';
import { requirePrincipal } from '../../shared/http/require-auth-context';

export type Actor = Readonly<{
  principal: Principal;
  requestId: string;
}>;

export function actorFromRequest(req: FastifyRequest): Actor {
  return {
    principal: requirePrincipal(req),
    requestId: req.requestContext.requestId,
  };
}
