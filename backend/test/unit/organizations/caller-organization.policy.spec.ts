import { describe, it, expect } from 'vitest';
import {
  assertCallerOrganizationActive,
  getCallerOrganizationFailure,
} from '../../../src/modules/organizations/policies/caller-organization.policy';
import { organizationDocumentSchema } from '../../../src/modules/organizations/organization.types';

const activeOrg = organizationDocumentSchema.parse({ org_id: 'org-1', name: 'Org One', status: 'active' });

describe('getCallerOrganizationFailure', () => {
  it('accepts an existing active organization', () => {
    expect(getCallerOrganizationFailure('org-1', activeOrg)).toBeNull();
  });

  it('distinguishes the three failure reasons but returns the same error code', () => {
    const noClaim = getCallerOrganizationFailure(null, null);
    const notFound = getCallerOrganizationFailure('org-1', null);
    const inactive = getCallerOrganizationFailure('org-1', { ...activeOrg, status: 'archived' });

    expect([noClaim?.reason, notFound?.reason, inactive?.reason]).toEqual([
      'no_org_claim',
      'org_not_found',
      'org_not_active',
    ]);
    for (const failure of [noClaim, notFound, inactive]) {
      expect(failure?.error.status).toBe(400);
      expect(failure?.error.code).toBe('INVALID_ORGANIZATION');
    }
  });

  it('looks at status, not is_active', () => {
    expect(getCallerOrganizationFailure('org-1', { ...activeOrg, is_active: false })).toBeNull();
  });

  it('echoes the rejected org id in the error data', () => {
    expect(getCallerOrganizationFailure('org-9', null)?.error.data).toEqual({ org_id: 'org-9' });
  });
});

describe('assertCallerOrganizationActive', () => {
  it('throws on failure', () => {
    expect(() => assertCallerOrganizationActive('org-1', null)).toThrow('Invalid or inactive organization');
  });
});
