import { describe, it, expect } from 'vitest';
import { authenticateBearer, extractBearerToken } from '../../../../src/shared/security/bearer-authentication';
import { JwtTokenCodec } from '../../../../src/shared/security/jwt-token-codec';

const codec = new JwtTokenCodec({
  secret: 'test-secret-for-unit-tests',
  algorithm: 'HS256',
  issuer: 'test-issuer',
  audience: 'test-audience',
  accessTtlMinutes: 30,
  refreshTtlDays: 7,
});

describe('extractBearerToken', () => {
  it('reads the token after the Bearer scheme, case-insensitively', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(extractBearerToken('bearer abc')).toBe('abc');
    expect(extractBearerToken('  Bearer   abc  ')).toBe('abc');
  });

  it('returns null for a missing or malformed header', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('')).toBeNull();
    expect(extractBearerToken('Basic abc')).toBeNull();
    expect(extractBearerToken('Bearer')).toBeNull();
    expect(extractBearerToken('Bearer a b')).toBeNull();
  });
});

describe('authenticateBearer', () => {
  it('builds a Principal from a valid access token', () => {
    const token = codec.issueAccess({
      subject: 'user-1',
      roles: ['admin', 'user'],
      orgId: 'org-1',
      businessUnitIds: ['bu-1'],
    });

    const result = authenticateBearer(`Bearer ${token}`, codec);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.userId).toBe('user-1');
    expect(result.value.roles).toEqual(['admin', 'user']);
    expect(result.value.orgId).toBe('org-1');
    expect(result.value.businessUnitIds).toEqual(['bu-1']);
  });

  it('defaults org to null and business units to null when the token has none', () => {
    const result = authenticateBearer(`Bearer ${codec.issueAccess({ subject: 'user-1', roles: [] })}`, codec);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.orgId).toBeNull();
    expect(result.value.businessUnitIds).toBeNull();
    expect(result.value.roles).toEqual([]);
  });

  it('distinguishes a missing header from a malformed one', () => {
    expect(authenticateBearer(undefined, codec)).toEqual({
      ok: false,
      error: { reason: 'missing_credentials', message: 'Authorization header is missing' },
    });
    expect(authenticateBearer('Token abc', codec)).toEqual({
      ok: false,
      error: { reason: 'missing_credentials', message: 'Malformed Authorization header' },
    });
  });

  it('passes the decode failure through', () => {
    const refresh = codec.issueRefresh({ subject: 'user-1' });
    const result = authenticateBearer(`Bearer ${refresh}`, codec);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('token_type_mismatch');
  });
});
