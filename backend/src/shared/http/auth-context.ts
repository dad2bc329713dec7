/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - Every request starts anonymous (principal = null); the bearer guard
 *   (shared/http/auth-guard.ts) fills the principal on routes that use it.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous context on every request.
 * 2. authenticate / optionalAuthenticate preHandlers overwrite it after decoding the token.
 * 3. Controllers read the principal through requirePrincipal(req).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Principal } from '../security/principal';

export type AuthContext = {
  principal: Principal | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = { principal: null };
    done();
  });
}
