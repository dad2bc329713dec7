import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';

import { registerRequestContext } from '../../../../src/shared/http/request-context';
import { registerAuthContext } from '../../../../src/shared/http/auth-context';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { createAuthGuard } from '../../../../src/shared/http/auth-guard';
import {
  requireBusinessUnits,
  requireOrgAndRoles,
  requireOrganization,
  requireRoles,
} from '../../../../src/shared/http/access-guards';
import { JwtTokenCodec } from '../../../../src/shared/security/jwt-token-codec';
import { readEnvelope } from '../../../helpers/envelope';

const codec = new JwtTokenCodec({
  secret: 'test-secret-for-unit-tests',
  algorithm: 'HS256',
  issuer: 'test-issuer',
  audience: 'test-audience',
  accessTtlMinutes: 30,
  refreshTtlDays: 7,
});

/** Same keys as `codec`, but its clock sits 31 minutes in the past. */
const staleCodec = new JwtTokenCodec({
  secret: 'test-secret-for-unit-tests',
  algorithm: 'HS256',
  issuer: 'test-issuer',
  audience: 'test-audience',
  accessTtlMinutes: 30,
  refreshTtlDays: 7,
  now: () => new Date(Date.now() - 31 * 60 * 1000),
});

function buildGuardedApp(): FastifyInstance {
  const app = Fastify({ logger: false });
  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  const guard = createAuthGuard({ tokenCodec: codec });

  app.get('/private', { preHandler: [guard.authenticate] }, (req) => ({
    userId: req.authContext.principal?.userId ?? null,
  }));
  app.get('/maybe', { preHandler: [guard.optionalAuthenticate] }, (req) => ({
    userId: req.authContext.principal?.userId ?? null,
  }));
  app.get('/managers', { preHandler: [guard.authenticate, requireRoles(['manager'])] }, () => ({ ok: true }));
  app.get(
    '/orgs/:orgId',
    {
      preHandler: [
        guard.authenticate,
        requireOrganization((req) => {
          const params = req.params;
          return typeof params === 'object' && params !== null && 'orgId' in params && typeof params.orgId === 'string'
            ? params.orgId
            : '';
        }),
      ],
    },
    () => ({ ok: true }),
  );
  app.get('/units', { preHandler: [guard.authenticate, requireBusinessUnits(['bu-7'])] }, () => ({ ok: true }));
  app.get(
    '/org-1/reports',
    { preHandler: [guard.authenticate, requireOrgAndRoles('org-1', ['admin', 'manager'])] },
    () => ({ ok: true }),
  );

  return app;
}

function bearerFor(opts: { roles?: string[]; orgId?: string; businessUnitIds?: string[] } = {}) {
  const token = codec.issueAccess({
    subject: 'user-1',
    roles: opts.roles ?? ['user'],
    orgId: opts.orgId ?? null,
    businessUnitIds: opts.businessUnitIds ?? null,
  });
  return { authorization: `Bearer ${token}` };
}

describe('auth guard preHandlers', () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it('authenticate attaches the principal', async () => {
    app = buildGuardedApp();
    const res = await app.inject({ method: 'GET', url: '/private', headers: bearerFor() });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ userId: 'user-1' });
  });

  it('authenticate answers every token problem with the same 401', async () => {
    app = buildGuardedApp();
    const refresh = codec.issueRefresh({ subject: 'user-1' });
    const expired = staleCodec.issueAccess({ subject: 'user-1', roles: ['user'], orgId: null, businessUnitIds: null });

    for (const headers of [
      {},
      { authorization: 'Basic abc' },
      { authorization: `Bearer ${refresh}` },
      { authorization: `Bearer ${expired}` },
    ]) {
      const res = await app.inject({ method: 'GET', url: '/private', headers });
      expect(res.statusCode).toBe(401);

      const body = readEnvelope(res);
      expect(body.success).toBe(false);
      expect(body.message).toBe('Invalid authentication credentials');
      expect(body.errors).toEqual([
        { code: 'INVALID_TOKEN', message: 'Invalid authentication credentials', field: 'authorization' },
      ]);
    }
  });

  it('optionalAuthenticate lets anonymous and bad-token callers through without a principal', async () => {
    app = buildGuardedApp();

    const anonymous = await app.inject({ method: 'GET', url: '/maybe' });
    expect(anonymous.json()).toEqual({ userId: null });

    const garbage = await app.inject({ method: 'GET', url: '/maybe', headers: { authorization: 'Bearer nope' } });
    expect(garbage.statusCode).toBe(200);
    expect(garbage.json()).toEqual({ userId: null });

    const valid = await app.inject({ method: 'GET', url: '/maybe', headers: bearerFor() });
    expect(valid.json()).toEqual({ userId: 'user-1' });
  });

  it('role, organization and business unit guards answer 403 INSUFFICIENT_PERMISSIONS', async () => {
    app = buildGuardedApp();

    const role = await app.inject({ method: 'GET', url: '/managers', headers: bearerFor() });
    expect(role.statusCode).toBe(403);
    expect(readEnvelope(role).errors).toEqual([
      { code: 'INSUFFICIENT_PERMISSIONS', message: 'Access denied', field: null },
    ]);

    const org = await app.inject({ method: 'GET', url: '/orgs/org-2', headers: bearerFor({ orgId: 'org-1' }) });
    expect(org.statusCode).toBe(403);

    const units = await app.inject({ method: 'GET', url: '/units', headers: bearerFor({ businessUnitIds: ['bu-1'] }) });
    expect(units.statusCode).toBe(403);
  });

  it('lets matching principals through the access guards', async () => {
    app = buildGuardedApp();

    const role = await app.inject({ method: 'GET', url: '/managers', headers: bearerFor({ roles: ['manager'] }) });
    expect(role.statusCode).toBe(200);

    const org = await app.inject({ method: 'GET', url: '/orgs/org-1', headers: bearerFor({ orgId: 'org-1' }) });
    expect(org.statusCode).toBe(200);

    const units = await app.inject({ method: 'GET', url: '/units', headers: bearerFor({ businessUnitIds: ['bu-7'] }) });
    expect(units.statusCode).toBe(200);
  });

  it('requireOrgAndRoles needs both the organization and one of the roles', async () => {
    app = buildGuardedApp();
    const url = '/org-1/reports';

    const wrongOrg = await app.inject({ method: 'GET', url, headers: bearerFor({ orgId: 'org-2', roles: ['admin'] }) });
    expect(wrongOrg.statusCode).toBe(403);

    const wrongRole = await app.inject({ method: 'GET', url, headers: bearerFor({ orgId: 'org-1' }) });
    expect(wrongRole.statusCode).toBe(403);

    const allowed = await app.inject({ method: 'GET', url, headers: bearerFor({ orgId: 'org-1', roles: ['manager'] }) });
    expect(allowed.statusCode).toBe(200);
  });

  it('answers unknown routes with ROUTE_NOT_FOUND', async () => {
    app = buildGuardedApp();
    const res = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(res.statusCode).toBe(404);
    expect(readEnvelope(res).errors[0]?.code).toBe('ROUTE_NOT_FOUND');
  });
});
