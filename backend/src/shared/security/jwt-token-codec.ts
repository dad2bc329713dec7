/**
 * backend/src/shared/security/jwt-token-codec.ts
 *
 * WHY:
 * - HMAC-signed JWTs (header.payload.signature) implementing TokenCodec.
 * - All settings (secret, algorithm, issuer, audience, TTLs) are fixed at construction
 *   and read-only afterwards; one instance is shared by every request.
 *
 * RULES:
 * - Reserved claims are always written by the codec; extra claims can never override them.
 * - `business_units` is omitted when empty, `org_id` when absent.
 * - Verification uses the injected clock with zero leeway.
 * - Decode failures are logged by the caller (guard/flows) with the reason code; the
 *   codec itself stays silent.
 */

import jwt from 'jsonwebtoken';
import type { Algorithm } from 'jsonwebtoken';

import { err, ok, type Result } from '../result/result';
import { systemClock, type Clock } from '../time/clock';
import { TokenIssuanceError } from './security.errors';
import {
  RESERVED_CLAIMS,
  tokenClaimsSchema,
  type ExtraClaims,
  type IssueAccessInput,
  type IssueRefreshInput,
  type TokenClaims,
  type TokenCodec,
  type TokenFailure,
  type TokenType,
} from './token-codec';

export type HmacAlgorithm = Extract<Algorithm, 'HS256' | 'HS384' | 'HS512'>;

export type JwtTokenCodecOptions = Readonly<{
  secret: string;
  algorithm: HmacAlgorithm;
  issuer: string;
  audience: string;
  accessTtlMinutes: number;
  refreshTtlDays: number;
  now?: Clock;
}>;

const RESERVED = new Set<string>(RESERVED_CLAIMS);

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class JwtTokenCodec implements TokenCodec {
  readonly accessTtlSeconds: number;

  private readonly refreshTtlSeconds: number;
  private readonly now: Clock;

  constructor(private readonly opts: JwtTokenCodecOptions) {
    this.accessTtlSeconds = opts.accessTtlMinutes * 60;
    this.refreshTtlSeconds = opts.refreshTtlDays * 24 * 60 * 60;
    this.now = opts.now ?? systemClock;
  }

  issueAccess(input: IssueAccessInput): string {
    return this.sign(this.buildClaims('access', this.accessTtlSeconds, input, input.roles));
  }

  issueRefresh(input: IssueRefreshInput): string {
    return this.sign(this.buildClaims('refresh', this.refreshTtlSeconds, input, null));
  }

  decodeAccess(token: string): Result<TokenClaims, TokenFailure> {
    return this.decode(token, 'access');
  }

  decodeRefresh(token: string): Result<TokenClaims, TokenFailure> {
    return this.decode(token, 'refresh');
  }

  refreshAccess(refreshToken: string, currentRoles: readonly string[]): Result<string, TokenFailure> {
    const decoded = this.decodeRefresh(refreshToken);
    if (!decoded.ok) return decoded;

    const claims = decoded.value;
    return ok(
      this.issueAccess({
        subject: claims.user_id,
        roles: currentRoles,
        orgId: claims.org_id ?? null,
        businessUnitIds: claims.business_units ?? null,
      }),
    );
  }

  // ── internals ──────────────────────────────────────────────

  private buildClaims(
    tokenType: TokenType,
    ttlSeconds: number,
    input: IssueRefreshInput,
    roles: readonly string[] | null,
  ): Record<string, unknown> {
    if (!input.subject) {
      throw new TokenIssuanceError('Token subject is required');
    }

    const claims: Record<string, unknown> = {};
    copyExtraClaims(claims, input.extraClaims);

    const iat = toEpochSeconds(this.now());

    claims.user_id = input.subject;
    if (roles) claims.roles = [...roles];
    claims.token_type = tokenType;
    claims.iat = iat;
    claims.exp = iat + ttlSeconds;
    claims.iss = this.opts.issuer;
    claims.aud = this.opts.audience;

    if (input.orgId) claims.org_id = input.orgId;
    if (input.businessUnitIds && input.businessUnitIds.length > 0) {
      claims.business_units = [...input.businessUnitIds];
    }

    return claims;
  }

  private sign(claims: Record<string, unknown>): string {
    try {
      return jwt.sign(claims, this.opts.secret, { algorithm: this.opts.algorithm });
    } catch (error) {
      throw new TokenIssuanceError('Token signing failed', { cause: error });
    }
  }

  private decode(token: string, expected: TokenType): Result<TokenClaims, TokenFailure> {
    let payload: unknown;

    try {
      payload = jwt.verify(token, this.opts.secret, {
        algorithms: [this.opts.algorithm],
        issuer: this.opts.issuer,
        audience: this.opts.audience,
        clockTimestamp: toEpochSeconds(this.now()),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return err({ reason: 'token_expired', message: 'Token has expired' });
      }
      return err({
        reason: 'token_invalid',
        message: error instanceof Error ? error.message : 'Token verification failed',
      });
    }

    const parsed = tokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      return err({ reason: 'token_invalid', message: 'Token payload is malformed' });
    }

    if (parsed.data.token_type !== expected) {
      return err({
        reason: 'token_type_mismatch',
        message: `Expected ${expected} token, got ${parsed.data.token_type}`,
      });
    }

    return ok(parsed.data);
  }
}

function copyExtraClaims(target: Record<string, unknown>, extra: ExtraClaims | undefined): void {
  if (!extra) return;
  for (const [key, value] of Object.entries(extra)) {
    if (!RESERVED.has(key)) target[key] = value;
  }
}
