import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { manualClock } from '../helpers/clock';
import { errorCode, paginationSchema, readData, readEnvelope } from '../helpers/envelope';
import { organizationRefSchema, publicUserSchema } from '../helpers/response-schemas';
import { accessTokenFor, bearer, seedAdmin, seedUser, TEST_PASSWORD } from '../helpers/seed';

const UserListSchema = z.object({
  users: z.array(publicUserSchema),
  pagination: paginationSchema,
  organization: organizationRefSchema,
});

describe('POST /users', () => {
  it('creates a user in the caller organization by default', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers,
        payload: {
          email: 'staff@example.com',
          username: 'staff',
          password: TEST_PASSWORD,
          roles: ['manager'],
          security: { is_email_verified: true },
        },
      });

      expect(res.statusCode).toBe(201);
      expect(readEnvelope(res).message).toBe('User created successfully');

      const user = readData(res, publicUserSchema);
      expect(user.org_id).toBe(orgId);
      expect(user.roles).toEqual(['manager']);
      expect(user.security).not.toHaveProperty('password_hash');

      // admin-created users can log in straight away
      const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'staff@example.com', password: TEST_PASSWORD },
      });
      expect(login.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('is admin only', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId } = await seedAdmin(deps);
      const manager = await seedUser(deps, { orgId, roles: ['manager'] });

      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: bearer(accessTokenFor(deps, manager)),
        payload: { email: 'x@example.com', username: 'x', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(403);
      expect(errorCode(res)).toBe('INSUFFICIENT_PERMISSIONS');
    } finally {
      await close();
    }
  });

  it('requires a token', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/users' });
      expect(res.statusCode).toBe(401);
      expect(errorCode(res)).toBe('INVALID_TOKEN');
    } finally {
      await close();
    }
  });
});

describe('GET /users', () => {
  it('lists users with the caller organization reference', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      await seedUser(deps, { orgId });

      const res = await app.inject({ method: 'GET', url: '/users', headers });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).message).toBe('Users retrieved successfully. Found 2 users.');

      const body = readData(res, UserListSchema);
      expect(body.organization).toEqual({ org_id: orgId, name: `Org ${orgId}` });
      expect(body.pagination.total_count).toBe(2);
      for (const user of body.users) {
        expect(user.security).not.toHaveProperty('password_hash');
      }
    } finally {
      await close();
    }
  });
});

describe('GET /users/:userId', () => {
  it('returns 404 USER_NOT_FOUND for an unknown id', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);

      const res = await app.inject({ method: 'GET', url: '/users/user-missing', headers });

      expect(res.statusCode).toBe(404);
      expect(errorCode(res)).toBe('USER_NOT_FOUND');
    } finally {
      await close();
    }
  });
});

describe('PUT /users/:userId', () => {
  it('patches nested sections without touching their siblings', async () => {
    const time = manualClock(new Date('2026-05-10T08:00:00.000Z'));
    const { app, deps, close } = await buildTestApp({ clock: time.clock });

    try {
      const { orgId, headers } = await seedAdmin(deps);
      const target = await seedUser(deps, { orgId });

      time.advance(3600);
      const res = await app.inject({
        method: 'PUT',
        url: `/users/${target.user_id}`,
        headers,
        payload: { profile: { first_name: 'Ana' }, preferences: { theme: 'dark' }, roles: ['manager'] },
      });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).message).toBe('User updated successfully');

      const user = readData(res, publicUserSchema);
      expect(user.updated_at).toBe('2026-05-10T09:00:00.000Z');
      expect(user.roles).toEqual(['manager']);
      expect(user.profile).toMatchObject({ first_name: 'Ana', last_name: '', locale: 'en-US' });
      expect(user).toMatchObject({ preferences: { theme: 'dark', content_language: 'en' } });
    } finally {
      await close();
    }
  });

  it('rejects unknown top-level keys', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      const target = await seedUser(deps, { orgId });

      const res = await app.inject({
        method: 'PUT',
        url: `/users/${target.user_id}`,
        headers,
        payload: { nickname: 'ana' },
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res)).toMatchObject({
        message: 'Invalid top-level fields provided: nickname',
        errors: [{ code: 'INVALID_FIELD', field: 'nickname' }],
      });
    } finally {
      await close();
    }
  });

  it('never patches the password hash', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      const target = await seedUser(deps, { orgId });

      const res = await app.inject({
        method: 'PUT',
        url: `/users/${target.user_id}`,
        headers,
        payload: { security: { password_hash: 'replaced' } },
      });

      expect(res.statusCode).toBe(400);
      expect(errorCode(res)).toBe('NO_FIELDS_TO_UPDATE');

      const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: target.email, password: TEST_PASSWORD },
      });
      expect(login.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('rejects an email held by another user', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, user: admin, headers } = await seedAdmin(deps);
      const target = await seedUser(deps, { orgId });

      const res = await app.inject({
        method: 'PUT',
        url: `/users/${target.user_id}`,
        headers,
        payload: { email: admin.email },
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).errors[0]).toEqual({
        code: 'EMAIL_ALREADY_EXISTS',
        message: 'Email address is already registered by another user',
        field: 'email',
      });
    } finally {
      await close();
    }
  });
});

describe('DELETE /users/:userId', () => {
  it('deletes once, then 404s', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      const target = await seedUser(deps, { orgId });

      const first = await app.inject({ method: 'DELETE', url: `/users/${target.user_id}`, headers });
      expect(first.statusCode).toBe(204);

      const second = await app.inject({ method: 'DELETE', url: `/users/${target.user_id}`, headers });
      expect(second.statusCode).toBe(404);
      expect(errorCode(second)).toBe('USER_NOT_FOUND');
    } finally {
      await close();
    }
  });
});
