import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { readData, readEnvelope } from '../helpers/envelope';
import { seedOrganization, seedUser, TEST_PASSWORD } from '../helpers/seed';

/**
 * E2E tests for POST /auth/login.
 *
 * Users are written straight into the store (skipping register) so each test
 * controls the account flags it needs.
 */

const LoginTokensSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal('Bearer'),
  expires_in: z.number(),
});

describe('POST /auth/login', () => {
  it('logs in with valid credentials and returns a token pair', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const user = await seedUser(deps, {
        email: 'login-ok@example.com',
        orgId,
        roles: ['manager'],
        businessUnits: ['bu-1'],
      });

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: '  Login-OK@Example.com ', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).message).toBe('Login successful');

      const tokens = readData(res, LoginTokensSchema);
      expect(tokens.expires_in).toBe(1800);

      const access = deps.tokenCodec.decodeAccess(tokens.access_token);
      expect(access.ok).toBe(true);
      if (!access.ok) return;
      expect(access.value.user_id).toBe(user.user_id);
      expect(access.value.roles).toEqual(['manager']);
      expect(access.value.org_id).toBe(orgId);
      expect(access.value.business_units).toEqual(['bu-1']);

      const refresh = deps.tokenCodec.decodeRefresh(tokens.refresh_token);
      expect(refresh.ok).toBe(true);

      const stored = await deps.store.collection('users').findOne({ user_id: user.user_id });
      expect(stored?.is_logged_in).toBe(true);
    } finally {
      await close();
    }
  });

  it('logs in again while already logged in', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const user = await seedUser(deps, { orgId });
      const payload = { email: user.email, password: TEST_PASSWORD };

      const first = await app.inject({ method: 'POST', url: '/auth/login', payload });
      const second = await app.inject({ method: 'POST', url: '/auth/login', payload });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('still logs in when recording the login fails', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const user = await seedUser(deps, { email: 'bookkeeping@example.com', orgId });
      const users = deps.store.collection('users');
      const updateOne = vi.spyOn(users, 'updateOne').mockRejectedValue(new Error('write refused'));

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: ' BOOKKEEPING@example.com ', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      const tokens = readData(res, LoginTokensSchema);
      expect(deps.tokenCodec.decodeAccess(tokens.access_token).ok).toBe(true);
      expect(deps.tokenCodec.decodeRefresh(tokens.refresh_token).ok).toBe(true);

      expect(updateOne).toHaveBeenCalledTimes(1);
      const stored = await users.findOne({ user_id: user.user_id });
      expect(stored?.is_logged_in).toBe(false);
    } finally {
      await close();
    }
  });

  it('answers an unknown email and a wrong password identically', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const user = await seedUser(deps, { orgId });

      const unknown = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'nobody@example.com', password: TEST_PASSWORD },
      });
      const wrong = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: user.email, password: 'wrong-password' },
      });

      expect(unknown.statusCode).toBe(401);
      expect(wrong.statusCode).toBe(401);
      expect(readEnvelope(unknown)).toEqual(readEnvelope(wrong));
      expect(readEnvelope(wrong).errors).toEqual([
        { code: 'INVALID_CREDENTIALS', message: 'Invalid email or password', field: 'email,password' },
      ]);
    } finally {
      await close();
    }
  });

  it('rejects missing credentials and malformed emails with 400', async () => {
    const { app, close } = await buildTestApp();

    try {
      const missing = await app.inject({ method: 'POST', url: '/auth/login', payload: { email: 'a@example.com' } });
      expect(missing.statusCode).toBe(400);
      expect(readEnvelope(missing).errors[0]?.code).toBe('MISSING_CREDENTIALS');

      const malformed = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'not-an-email', password: TEST_PASSWORD },
      });
      expect(malformed.statusCode).toBe(400);
      expect(readEnvelope(malformed).errors[0]?.code).toBe('INVALID_EMAIL_FORMAT');
    } finally {
      await close();
    }
  });

  it('reports EMAIL_NOT_VERIFIED before checking the password', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const user = await seedUser(deps, { orgId, emailVerified: false });

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: user.email, password: 'wrong-password' },
      });

      expect(res.statusCode).toBe(403);
      expect(readEnvelope(res).errors[0]?.code).toBe('EMAIL_NOT_VERIFIED');
    } finally {
      await close();
    }
  });

  it('refuses inactive, banned, suspended and unassigned accounts with 403', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const cases = [
        { user: await seedUser(deps, { orgId, isActive: false }), code: 'ACCOUNT_INACTIVE' },
        { user: await seedUser(deps, { orgId, isBanned: true }), code: 'ACCOUNT_BANNED' },
        { user: await seedUser(deps, { orgId, isSuspended: true }), code: 'ACCOUNT_SUSPENDED' },
        { user: await seedUser(deps, { orgId: null }), code: 'NO_ORGANIZATION' },
      ];

      for (const { user, code } of cases) {
        const res = await app.inject({
          method: 'POST',
          url: '/auth/login',
          payload: { email: user.email, password: TEST_PASSWORD },
        });
        expect(res.statusCode).toBe(403);
        expect(readEnvelope(res).errors[0]?.code).toBe(code);
      }
    } finally {
      await close();
    }
  });

  it('answers a malformed JSON body with INVALID_REQUEST_BODY', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        headers: { 'content-type': 'application/json' },
        payload: '{"email":',
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).errors[0]?.code).toBe('INVALID_REQUEST_BODY');
    } finally {
      await close();
    }
  });
});
