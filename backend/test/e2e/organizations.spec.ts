import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';
import { manualClock } from '../helpers/clock';
import { errorCode, paginationSchema, readData, readEnvelope } from '../helpers/envelope';
import { businessUnitSchema, organizationRefSchema, organizationSchema } from '../helpers/response-schemas';
import { accessTokenFor, bearer, seedAdmin, seedOrganization, seedUser } from '../helpers/seed';

const OrganizationListSchema = z.object({
  organizations: z.array(organizationSchema),
  pagination: paginationSchema,
});

const OrganizationUnitsSchema = z.object({
  business_units: z.array(businessUnitSchema),
  pagination: paginationSchema,
  organization: organizationRefSchema,
});

describe('POST /organizations', () => {
  it('creates an active organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers,
        payload: { org_id: 'org-acme', name: '  Acme  ', address: { city: 'Lisbon' } },
      });

      expect(res.statusCode).toBe(201);
      expect(readEnvelope(res).message).toBe('Organization created successfully');

      const org = readData(res, organizationSchema);
      expect(org.org_id).toBe('org-acme');
      expect(org.name).toBe('Acme');
      expect(org.status).toBe('active');
      expect(org.is_active).toBe(true);
      expect(org.business_units).toEqual([]);
      expect(org.projects).toEqual([]);
      expect(org).toMatchObject({
        address: { street: null, city: 'Lisbon', state: null, zip_code: null, country: null },
      });
    } finally {
      await close();
    }
  });

  it('rejects a missing name, a taken id and a taken name', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);

      const missing = await app.inject({ method: 'POST', url: '/organizations', headers, payload: { name: ' ' } });
      expect(missing.statusCode).toBe(400);
      expect(errorCode(missing)).toBe('MISSING_ORGANIZATION_NAME');

      const takenId = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers,
        payload: { org_id: orgId, name: 'Brand new' },
      });
      expect(takenId.statusCode).toBe(400);
      expect(errorCode(takenId)).toBe('ORG_ID_ALREADY_EXISTS');

      const takenName = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers,
        payload: { name: `Org ${orgId}` },
      });
      expect(takenName.statusCode).toBe(400);
      expect(errorCode(takenName)).toBe('ORG_NAME_ALREADY_EXISTS');
    } finally {
      await close();
    }
  });

  it('rejects unknown fields', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers,
        payload: { name: 'Acme', color: 'blue' },
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).errors).toEqual([
        { code: 'INVALID_FIELD', message: "Field 'color' is not a valid top-level field", field: 'color' },
      ]);
    } finally {
      await close();
    }
  });

  it('is admin only', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const orgId = await seedOrganization(deps);
      const manager = await seedUser(deps, { orgId, roles: ['manager'] });

      const res = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers: bearer(accessTokenFor(deps, manager)),
        payload: { name: 'Acme' },
      });

      expect(res.statusCode).toBe(403);
      expect(errorCode(res)).toBe('INSUFFICIENT_PERMISSIONS');
    } finally {
      await close();
    }
  });
});

describe('GET /organizations', () => {
  it('lists organizations with pagination', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);
      await seedOrganization(deps);
      await seedOrganization(deps);

      const all = await app.inject({ method: 'GET', url: '/organizations', headers });
      expect(all.statusCode).toBe(200);
      expect(readEnvelope(all).message).toBe('Organizations retrieved successfully. Found 3 organizations.');
      expect(readData(all, OrganizationListSchema).pagination).toEqual({
        total_count: 3,
        returned_count: 3,
        limit: 100,
        skip: 0,
        has_more: false,
      });

      const page = await app.inject({ method: 'GET', url: '/organizations?limit=1&skip=1', headers });
      const body = readData(page, OrganizationListSchema);
      expect(body.organizations).toHaveLength(1);
      expect(body.pagination).toEqual({ total_count: 3, returned_count: 1, limit: 1, skip: 1, has_more: true });
    } finally {
      await close();
    }
  });

  it('rejects out-of-range pagination', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);

      const limit = await app.inject({ method: 'GET', url: '/organizations?limit=0', headers });
      expect(limit.statusCode).toBe(400);
      expect(errorCode(limit)).toBe('INVALID_LIMIT');

      const skip = await app.inject({ method: 'GET', url: '/organizations?skip=-1', headers });
      expect(skip.statusCode).toBe(400);
      expect(errorCode(skip)).toBe('INVALID_SKIP');
    } finally {
      await close();
    }
  });
});

describe('GET /organizations/:orgId', () => {
  it('returns the organization, or 404', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);

      const found = await app.inject({ method: 'GET', url: `/organizations/${orgId}`, headers });
      expect(found.statusCode).toBe(200);
      expect(readData(found, organizationSchema).org_id).toBe(orgId);

      const missing = await app.inject({ method: 'GET', url: '/organizations/org-missing', headers });
      expect(missing.statusCode).toBe(404);
      expect(errorCode(missing)).toBe('ORGANIZATION_NOT_FOUND');
    } finally {
      await close();
    }
  });

  it('refuses callers whose own organization is not active', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const suspendedOrg = await seedOrganization(deps, { status: 'suspended' });
      const admin = await seedUser(deps, { orgId: suspendedOrg, roles: ['admin'] });
      const otherOrg = await seedOrganization(deps);

      const res = await app.inject({
        method: 'GET',
        url: `/organizations/${otherOrg}`,
        headers: bearer(accessTokenFor(deps, admin)),
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res)).toMatchObject({
        success: false,
        message: 'Invalid or inactive organization',
        data: { org_id: suspendedOrg },
      });
      expect(errorCode(res)).toBe('INVALID_ORGANIZATION');
    } finally {
      await close();
    }
  });
});

describe('PUT /organizations/:orgId', () => {
  it('patches existing fields and stamps updated_at', async () => {
    const start = new Date('2026-03-01T09:00:00.000Z');
    const time = manualClock(start);
    const { app, deps, close } = await buildTestApp({ clock: time.clock });

    try {
      const { headers } = await seedAdmin(deps);
      const created = await app.inject({
        method: 'POST',
        url: '/organizations',
        headers,
        payload: { org_id: 'org-patch', name: 'Patch Me', address: { city: 'Porto' } },
      });
      expect(created.statusCode).toBe(201);

      time.advance(60);
      const res = await app.inject({
        method: 'PUT',
        url: '/organizations/org-patch',
        headers,
        payload: { description: 'Updated', address: { country: 'PT' } },
      });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).message).toBe('Organization updated successfully');

      const org = readData(res, organizationSchema);
      expect(org.updated_at).toBe('2026-03-01T09:01:00.000Z');
      expect(org.created_at).toBe('2026-03-01T09:00:00.000Z');
      expect(org).toMatchObject({
        description: 'Updated',
        address: { street: null, city: 'Porto', state: null, zip_code: null, country: 'PT' },
      });
    } finally {
      await close();
    }
  });

  it('refuses fields the stored document does not have', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);

      const res = await app.inject({
        method: 'PUT',
        url: `/organizations/${orgId}`,
        headers,
        payload: { short_name: 'ACME' },
      });

      expect(res.statusCode).toBe(400);
      expect(readEnvelope(res).errors).toEqual([
        {
          code: 'INVALID_FIELD',
          message: "Field 'short_name' does not exist in organization data structure",
          field: 'short_name',
        },
      ]);
    } finally {
      await close();
    }
  });

  it('refuses an empty update and a name held by another organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);
      const other = await seedOrganization(deps, { name: 'Taken Name' });

      const empty = await app.inject({ method: 'PUT', url: `/organizations/${orgId}`, headers, payload: {} });
      expect(empty.statusCode).toBe(400);
      expect(errorCode(empty)).toBe('NO_FIELDS_TO_UPDATE');

      const taken = await app.inject({
        method: 'PUT',
        url: `/organizations/${orgId}`,
        headers,
        payload: { name: 'Taken Name' },
      });
      expect(taken.statusCode).toBe(400);
      expect(errorCode(taken)).toBe('ORG_NAME_ALREADY_EXISTS');

      const own = await app.inject({
        method: 'PUT',
        url: `/organizations/${other}`,
        headers,
        payload: { name: 'Taken Name' },
      });
      expect(own.statusCode).toBe(200);
    } finally {
      await close();
    }
  });
});

describe('DELETE /organizations/:orgId', () => {
  it('blocks deletion while business units exist', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);
      const target = await seedOrganization(deps);

      const unit = await app.inject({
        method: 'POST',
        url: `/organizations/${target}/business-units`,
        headers,
        payload: { name: 'Sales' },
      });
      expect(unit.statusCode).toBe(201);

      const blocked = await app.inject({ method: 'DELETE', url: `/organizations/${target}`, headers });
      expect(blocked.statusCode).toBe(400);
      expect(errorCode(blocked)).toBe('ORGANIZATION_HAS_DEPENDENCIES');
    } finally {
      await close();
    }
  });

  it('deletes an organization without units', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { headers } = await seedAdmin(deps);
      const target = await seedOrganization(deps);

      const res = await app.inject({ method: 'DELETE', url: `/organizations/${target}`, headers });
      expect(res.statusCode).toBe(204);

      const again = await app.inject({ method: 'DELETE', url: `/organizations/${target}`, headers });
      expect(again.statusCode).toBe(404);
      expect(errorCode(again)).toBe('ORGANIZATION_NOT_FOUND');
    } finally {
      await close();
    }
  });
});

describe('GET /organizations/:orgId/units', () => {
  it('lists the units linked to the organization', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const { orgId, headers } = await seedAdmin(deps);

      for (const name of ['Sales', 'Support']) {
        const created = await app.inject({
          method: 'POST',
          url: `/organizations/${orgId}/business-units`,
          headers,
          payload: { name },
        });
        expect(created.statusCode).toBe(201);
      }

      const res = await app.inject({ method: 'GET', url: `/organizations/${orgId}/units`, headers });

      expect(res.statusCode).toBe(200);
      expect(readEnvelope(res).message).toBe(
        'Organization units retrieved successfully. Found 2 business units.',
      );

      const body = readData(res, OrganizationUnitsSchema);
      expect(body.business_units.map((unit) => unit.name).sort()).toEqual(['Sales', 'Support']);
      expect(body.organization).toEqual({ org_id: orgId, name: `Org ${orgId}` });
      expect(body.pagination.total_count).toBe(2);
    } finally {
      await close();
    }
  });
});
