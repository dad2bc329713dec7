/**
 * backend/src/shared/security/token-codec.ts
 *
 * WHY:
 * - Access/refresh tokens are stateless signed claim sets. Nothing is stored server side;
 *   validity is signature + issuer/audience + expiry + token_type at decode time.
 * - Services depend on this interface; JwtTokenCodec is the implementation.
 *
 * CLAIMS (wire contract):
 *   { user_id, roles, token_type: 'access', iat, exp, iss, aud, org_id?, business_units? }
 *   Refresh tokens have the same shape with token_type 'refresh' and NO roles claim:
 *   roles are re-read from the user record at refresh time.
 *
 * RULES:
 * - decode*() never throws: failures are returned as a TokenFailure with a reason code.
 * - issue*() throws TokenIssuanceError when signing fails.
 */

import { z } from 'zod';
import type { Result } from '../result/result';

export type TokenType = 'access' | 'refresh';

export const RESERVED_CLAIMS = [
  'user_id',
  'roles',
  'token_type',
  'iat',
  'exp',
  'iss',
  'aud',
  'org_id',
  'business_units',
] as const;

/**
 * Shape check applied after signature/issuer/audience/expiry verification.
 * Anything that fails here is a malformed payload (TokenInvalid).
 */
export const tokenClaimsSchema = z
  .object({
    user_id: z.string().min(1),
    roles: z.array(z.string()).optional(),
    token_type: z.enum(['access', 'refresh']),
    iat: z.number().int(),
    exp: z.number().int(),
    iss: z.string(),
    aud: z.string(),
    org_id: z.string().optional(),
    business_units: z.array(z.string()).optional(),
  })
  .passthrough();

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

export type TokenFailureReason = 'token_expired' | 'token_invalid' | 'token_type_mismatch';

export type TokenFailure = Readonly<{
  reason: TokenFailureReason;
  message: string;
}>;

export type ExtraClaims = Readonly<Record<string, unknown>>;

export type IssueAccessInput = Readonly<{
  subject: string;
  roles: readonly string[];
  orgId?: string | null;
  businessUnitIds?: readonly string[] | null;
  extraClaims?: ExtraClaims;
}>;

export type IssueRefreshInput = Omit<IssueAccessInput, 'roles'>;

export interface TokenCodec {
  /** Access-token lifetime in seconds (drives `expires_in` in login/refresh responses). */
  readonly accessTtlSeconds: number;

  issueAccess(input: IssueAccessInput): string;
  issueRefresh(input: IssueRefreshInput): string;

  decodeAccess(token: string): Result<TokenClaims, TokenFailure>;
  decodeRefresh(token: string): Result<TokenClaims, TokenFailure>;

  /**
   * Decodes a refresh token and issues a new access token for its subject carrying
   * `currentRoles` (supplied by the caller from a fresh lookup), plus the refresh
   * token's org/business-unit claims.
   */
  refreshAccess(refreshToken: string, currentRoles: readonly string[]): Result<string, TokenFailure>;
}
