import { describe, it, expect } from 'vitest';
import {
  checkAdmin,
  checkBusinessUnits,
  checkOrgAndRoles,
  checkOrganization,
  checkRoles,
} from '../../../../src/shared/security/access-predicates';
import type { Principal } from '../../../../src/shared/security/principal';

function principal(overrides: Partial<Principal> = {}): Principal {
  return {
    userId: 'user-1',
    roles: ['manager'],
    orgId: 'org-1',
    businessUnitIds: ['bu-1', 'bu-2'],
    claims: {
      user_id: 'user-1',
      token_type: 'access',
      iat: 0,
      exp: 60,
      iss: 'test-issuer',
      aud: 'test-audience',
    },
    ...overrides,
  };
}

describe('access predicates', () => {
  it('checkRoles passes when any required role is held and returns the principal unchanged', () => {
    const p = principal();
    expect(checkRoles(p, ['admin', 'manager'])).toEqual({ ok: true, value: p });
  });

  it('checkRoles fails with role_mismatch', () => {
    const result = checkRoles(principal(), ['admin']);
    expect(result).toEqual({
      ok: false,
      error: { reason: 'role_mismatch', message: 'Requires one of roles: admin' },
    });
  });

  it('checkAdmin needs the admin role', () => {
    expect(checkAdmin(principal()).ok).toBe(false);
    expect(checkAdmin(principal({ roles: ['admin'] })).ok).toBe(true);
  });

  it('checkOrganization compares the org claim exactly', () => {
    expect(checkOrganization(principal(), 'org-1').ok).toBe(true);

    const other = checkOrganization(principal(), 'org-2');
    expect(other.ok).toBe(false);
    if (!other.ok) expect(other.error.reason).toBe('organization_mismatch');

    expect(checkOrganization(principal({ orgId: null }), 'org-1').ok).toBe(false);
  });

  it('checkBusinessUnits needs at least one overlap', () => {
    expect(checkBusinessUnits(principal(), ['bu-2', 'bu-9']).ok).toBe(true);
    expect(checkBusinessUnits(principal(), ['bu-9']).ok).toBe(false);
    expect(checkBusinessUnits(principal({ businessUnitIds: null }), ['bu-1']).ok).toBe(false);
  });

  it('checkOrgAndRoles reports the organization failure first', () => {
    const result = checkOrgAndRoles(principal({ roles: ['user'] }), 'org-2', ['admin']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('organization_mismatch');

    const roleOnly = checkOrgAndRoles(principal({ roles: ['user'] }), 'org-1', ['admin']);
    expect(roleOnly.ok).toBe(false);
    if (!roleOnly.ok) expect(roleOnly.error.reason).toBe('role_mismatch');

    expect(checkOrgAndRoles(principal(), 'org-1', ['manager']).ok).toBe(true);
  });
});
