import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requirePrincipal } from '../../../../src/shared/http/require-auth-context';
import type { Principal } from '../../../../src/shared/security/principal';

function makeReq(principal: Principal | null): FastifyRequest {
  return { authContext: { principal } } as unknown as FastifyRequest;
}

describe('requirePrincipal', () => {
  it('throws the generic 401 when the request carries no principal', () => {
    try {
      requirePrincipal(makeReq(null));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof AppError)) return;
      expect(err.status).toBe(401);
      expect(err.code).toBe('INVALID_TOKEN');
      expect(err.message).toBe('Invalid authentication credentials');
    }
  });

  it('returns the principal when present', () => {
    const principal: Principal = {
      userId: 'user-1',
      roles: ['user'],
      orgId: 'org-1',
      businessUnitIds: null,
      claims: { user_id: 'user-1', token_type: 'access', iat: 0, exp: 60, iss: 'i', aud: 'a' },
    };

    expect(requirePrincipal(makeReq(principal))).toBe(principal);
  });
});
