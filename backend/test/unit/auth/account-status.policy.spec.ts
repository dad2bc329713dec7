import { describe, it, expect } from 'vitest';
import { getAccountStatusFailure } from '../../../src/modules/auth/policies/account-status.policy';

const healthy = { is_active: true, is_banned: false, is_suspended: false };

describe('getAccountStatusFailure', () => {
  it('allows an active, unbanned, unsuspended account', () => {
    expect(getAccountStatusFailure(healthy)).toBeNull();
  });

  it('treats null flags as their defaults', () => {
    expect(getAccountStatusFailure({ is_active: null, is_banned: null, is_suspended: null })).toBeNull();
  });

  it('checks is_active, then is_banned, then is_suspended', () => {
    expect(getAccountStatusFailure({ is_active: false, is_banned: true, is_suspended: true })?.reason).toBe(
      'account_inactive',
    );
    expect(getAccountStatusFailure({ ...healthy, is_banned: true, is_suspended: true })?.reason).toBe(
      'account_banned',
    );
    expect(getAccountStatusFailure({ ...healthy, is_suspended: true })?.reason).toBe('account_suspended');
  });

  it('maps each failure to a 403 with its own code', () => {
    const failure = getAccountStatusFailure({ ...healthy, is_banned: true });
    expect(failure?.error.status).toBe(403);
    expect(failure?.error.code).toBe('ACCOUNT_BANNED');
  });
});
