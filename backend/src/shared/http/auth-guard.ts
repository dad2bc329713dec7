/**
 * backend/src/shared/http/auth-guard.ts
 *
 * WHY:
 * - Fastify adapter for the Authentication Guard (shared/security/bearer-authentication.ts).
 * - Two variants:
 *   - authenticate: rejects with the generic 401 on any failure.
 *   - optionalAuthenticate: never rejects; leaves the principal null instead.
 *
 * HOW TO USE:
 *   const guard = createAuthGuard({ tokenCodec });
 *   app.get('/auth/me', { preHandler: [guard.authenticate] }, handler);
 *
 * RULES:
 * - The precise failure reason (token_expired, token_invalid, token_type_mismatch,
 *   missing_credentials) is logged, never returned.
 * - Never log the raw token.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TokenCodec } from '../security/token-codec';
import { authenticateBearer } from '../security/bearer-authentication';
import { withRequestContext } from '../logger/with-context';
import { AccessErrors } from './access-errors';

export type PreHandler = (req: FastifyRequest, reply: FastifyReply) => Promise<void>;

export type AuthGuard = {
  authenticate: PreHandler;
  optionalAuthenticate: PreHandler;
};

export function createAuthGuard(deps: { tokenCodec: TokenCodec }): AuthGuard {
  return {
    async authenticate(req: FastifyRequest) {
      const result = authenticateBearer(req.headers.authorization, deps.tokenCodec);

      if (!result.ok) {
        withRequestContext(req).warn('auth.guard.rejected', {
          flow: 'auth.guard',
          reason: result.error.reason,
          detail: result.error.message,
        });
        throw AccessErrors.invalidCredentials({ reason: result.error.reason });
      }

      req.authContext = { principal: result.value };
    },

    async optionalAuthenticate(req: FastifyRequest) {
      const result = authenticateBearer(req.headers.authorization, deps.tokenCodec);

      if (!result.ok) {
        if (result.error.reason !== 'missing_credentials') {
          withRequestContext(req).debug('auth.guard.anonymous', {
            flow: 'auth.guard',
            reason: result.error.reason,
          });
        }
        req.authContext = { principal: null };
        return;
      }

      req.authContext = { principal: result.value };
    },
  };
}
