/**
 * backend/src/modules/auth/helpers/effective-roles.ts
 *
 * Roles that go into an access token: the record's roles, or DEFAULT_ROLES when empty.
 */

import { DEFAULT_ROLES } from '../auth.types';

export function effectiveRoles(roles: readonly string[] | null): readonly string[] {
  return roles && roles.length > 0 ? roles : DEFAULT_ROLES;
}
