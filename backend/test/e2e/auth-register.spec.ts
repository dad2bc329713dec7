import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { errorCode, readData, readEnvelope } from '../helpers/envelope';
import { publicUserSchema } from '../helpers/response-schemas';
import { seedUser, TEST_PASSWORD } from '../helpers/seed';

describe('POST /auth/register', () => {
  it('creates an unassigned, unverified user with default roles and tags', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        headers: { 'user-agent': 'register-test' },
        payload: {
          email: ' New.User@Example.com ',
          username: 'new-user',
          password: TEST_PASSWORD,
          profile: { first_name: 'Nia', last_name: 'Lopez' },
        },
      });

      expect(res.statusCode).toBe(201);
      expect(readEnvelope(res).message).toBe('User registered successfully');

      const user = readData(res, publicUserSchema);
      expect(user.email).toBe('new.user@example.com');
      expect(user.username).toBe('new-user');
      expect(user.org_id).toBeNull();
      expect(user.roles).toEqual(['user']);
      expect(user.tags).toEqual(['new_user']);
      expect(user.is_active).toBe(true);
      expect(user.is_logged_in).toBe(false);
      expect(user.profile?.first_name).toBe('Nia');
      expect(user.security?.is_email_verified).toBe(false);
      expect(user.security).not.toHaveProperty('password_hash');

      const stored = await deps.store.collection('users').findOne({ user_id: user.user_id });
      expect(stored?.metadata).toMatchObject({ registration_source: 'web', user_agent: 'register-test' });
    } finally {
      await close();
    }
  });

  it('ignores privileged fields in the payload', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: {
          email: 'sneaky@example.com',
          username: 'sneaky',
          password: TEST_PASSWORD,
          roles: ['admin'],
          org_id: 'org-other',
          is_banned: true,
          security: { is_email_verified: true },
        },
      });

      expect(res.statusCode).toBe(201);

      const user = readData(res, publicUserSchema);
      expect(user.roles).toEqual(['user']);
      expect(user.org_id).toBeNull();
      expect(user.security?.is_email_verified).toBe(false);
      expect(user).toMatchObject({ is_banned: false });
    } finally {
      await close();
    }
  });

  it('registered users cannot log in until assigned to an organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { email: 'pending@example.com', username: 'pending', password: TEST_PASSWORD },
      });

      const stored = await deps.store.collection('users').findOne({ email: 'pending@example.com' });
      expect(stored).not.toBeNull();

      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'pending@example.com', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(403);
      expect(errorCode(res)).toBe('NO_ORGANIZATION');
    } finally {
      await close();
    }
  });

  it('validates required fields, email syntax and password length', async () => {
    const { app, close } = await buildTestApp();

    try {
      const cases = [
        { payload: { email: 'a@example.com', password: TEST_PASSWORD }, code: 'MISSING_REQUIRED_FIELDS' },
        { payload: { email: 'not-an-email', username: 'u1', password: TEST_PASSWORD }, code: 'INVALID_EMAIL_FORMAT' },
        { payload: { email: 'short@example.com', username: 'u2', password: 'short' }, code: 'INVALID_PASSWORD' },
        {
          payload: { email: 'long@example.com', username: 'u3', password: 'x'.repeat(129) },
          code: 'INVALID_PASSWORD',
        },
      ];

      for (const { payload, code } of cases) {
        const res = await app.inject({ method: 'POST', url: '/auth/register', payload });
        expect(res.statusCode).toBe(400);
        expect(errorCode(res)).toBe(code);
      }
    } finally {
      await close();
    }
  });

  it('rejects a taken email (case-insensitively) and a taken username', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      await seedUser(deps, { email: 'taken@example.com', username: 'taken-name' });

      const email = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { email: 'TAKEN@example.com', username: 'fresh-name', password: TEST_PASSWORD },
      });
      expect(email.statusCode).toBe(400);
      expect(errorCode(email)).toBe('EMAIL_ALREADY_EXISTS');

      const username = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { email: 'fresh@example.com', username: 'taken-name', password: TEST_PASSWORD },
      });
      expect(username.statusCode).toBe(400);
      expect(errorCode(username)).toBe('USERNAME_ALREADY_EXISTS');
    } finally {
      await close();
    }
  });
});
