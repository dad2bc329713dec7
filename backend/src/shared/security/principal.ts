/**
 * backend/src/shared/security/principal.ts
 *
 * WHY:
 * - The Principal is the authenticated identity for ONE request, rebuilt from a
 *   verified access token. It is never cached or shared across requests.
 */

import type { TokenClaims } from './token-codec';

export type Principal = Readonly<{
  userId: string;
  roles: readonly string[];
  orgId: string | null;
  businessUnitIds: readonly string[] | null;
  /** Full verified claim set, for checks beyond the standard predicates. */
  claims: Readonly<TokenClaims>;
}>;

export function principalFromClaims(claims: TokenClaims): Principal {
  return {
    userId: claims.user_id,
    roles: claims.roles ?? [],
    orgId: claims.org_id ?? null,
    businessUnitIds: claims.business_units ?? null,
    claims,
  };
}
