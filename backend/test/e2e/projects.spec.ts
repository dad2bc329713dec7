import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { errorCode, paginationSchema, readData, readEnvelope } from '../helpers/envelope';
import { organizationSchema, projectSchema } from '../helpers/response-schemas';
import { accessTokenFor, bearer, seedAdmin, seedUser } from '../helpers/seed';

const ProjectListSchema = z.object({ projects: z.array(projectSchema), pagination: paginationSchema });

describe('projects', () => {
  it('lets a manager create a project in their own organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps, { roles: ['manager'] });

      const res = await app.inject({
        method: 'POST',
        url: '/projects',
        headers,
        payload: { project_id: 'proj-1', name: 'Website', org_id: 'ignored' },
      });

      // org_id is not a client field on create
      expect(res.statusCode).toBe(400);
      expect(errorCode(res)).toBe('INVALID_FIELD');

      const created = await app.inject({
        method: 'POST',
        url: '/projects',
        headers,
        payload: { project_id: 'proj-1', name: 'Website' },
      });

      expect(created.statusCode).toBe(201);
      expect(readEnvelope(created).message).toBe('Project created successfully');
      expect(readData(created, projectSchema)).toMatchObject({
        project_id: 'proj-1',
        name: 'Website',
        org_id: orgId,
        status: 'planning',
        owner: null,
        modules: [],
      });

      const org = await app.inject({ method: 'GET', url: `/organizations/${orgId}`, headers });
      expect(readData(org, organizationSchema).projects).toEqual(['proj-1']);
    } finally {
      await close();
    }
  });

  it('forbids plain users from writing', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId } = await seedAdmin(deps);
      const user = await seedUser(deps, { orgId, roles: ['user'] });

      const res = await app.inject({
        method: 'POST',
        url: '/projects',
        headers: bearer(accessTokenFor(deps, user)),
        payload: { name: 'Website' },
      });

      expect(res.statusCode).toBe(403);
      expect(errorCode(res)).toBe('INSUFFICIENT_PERMISSIONS');
    } finally {
      await close();
    }
  });

  it('hides projects of other organizations', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const mine = await seedAdmin(deps);
      const theirs = await seedAdmin(deps);

      const created = await app.inject({
        method: 'POST',
        url: '/projects',
        headers: theirs.headers,
        payload: { project_id: 'proj-theirs', name: 'Secret' },
      });
      expect(created.statusCode).toBe(201);

      const res = await app.inject({ method: 'GET', url: '/projects/proj-theirs', headers: mine.headers });
      expect(res.statusCode).toBe(404);
      expect(errorCode(res)).toBe('PROJECT_NOT_FOUND');

      const list = await app.inject({ method: 'GET', url: '/projects', headers: mine.headers });
      expect(readEnvelope(list).message).toBe('Projects retrieved successfully. Found 0 projects.');
      expect(readData(list, ProjectListSchema).projects).toEqual([]);
    } finally {
      await close();
    }
  });

  it('rejects duplicate names within the organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);
      const payload = { name: 'Website' };

      const first = await app.inject({ method: 'POST', url: '/projects', headers, payload });
      expect(first.statusCode).toBe(201);

      const second = await app.inject({ method: 'POST', url: '/projects', headers, payload });
      expect(second.statusCode).toBe(400);
      expect(errorCode(second)).toBe('PROJECT_NAME_ALREADY_EXISTS');
    } finally {
      await close();
    }
  });

  it('updates a project and blocks deletion while it has modules', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      await app.inject({ method: 'POST', url: '/projects', headers, payload: { project_id: 'proj-2', name: 'App' } });

      const updated = await app.inject({
        method: 'PUT',
        url: '/projects/proj-2',
        headers,
        payload: { status: 'active', budget: 1500 },
      });
      expect(updated.statusCode).toBe(200);
      expect(readData(updated, projectSchema)).toMatchObject({ status: 'active', budget: 1500 });

      const mod = await app.inject({
        method: 'POST',
        url: '/projects/proj-2/modules',
        headers,
        payload: { module_id: 'mod-1', name: 'Checkout' },
      });
      expect(mod.statusCode).toBe(201);

      const blocked = await app.inject({ method: 'DELETE', url: '/projects/proj-2', headers });
      expect(blocked.statusCode).toBe(400);
      expect(errorCode(blocked)).toBe('PROJECT_HAS_DEPENDENCIES');

      const removeModule = await app.inject({ method: 'DELETE', url: '/projects/proj-2/modules/mod-1', headers });
      expect(removeModule.statusCode).toBe(204);

      const removed = await app.inject({ method: 'DELETE', url: '/projects/proj-2', headers });
      expect(removed.statusCode).toBe(204);

      const org = await app.inject({ method: 'GET', url: `/organizations/${orgId}`, headers });
      expect(readData(org, organizationSchema).projects).toEqual([]);
    } finally {
      await close();
    }
  });
});
