/**
 * backend/src/shared/security/bearer-authentication.ts
 *
 * WHY:
 * - Framework-free core of the Authentication Guard:
 *     Authorization header -> bearer token -> decodeAccess -> Principal
 * - Returns a Result so the HTTP adapter (shared/http/auth-guard.ts) decides whether
 *   a failure rejects the request (authenticate) or yields an anonymous caller
 *   (optionalAuthenticate).
 *
 * RULES:
 * - Failure reasons stay distinct here (for operator logs); clients only ever see
 *   one generic 401.
 */

import { err, ok, type Result } from '../result/result';
import { principalFromClaims, type Principal } from './principal';
import type { TokenCodec, TokenFailure } from './token-codec';

export type AuthFailure =
  | TokenFailure
  | Readonly<{ reason: 'missing_credentials'; message: string }>;

const BEARER_PATTERN = /^Bearer[ \t]+(\S+)[ \t]*$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

export function authenticateBearer(
  header: string | undefined,
  tokenCodec: TokenCodec,
): Result<Principal, AuthFailure> {
  const token = extractBearerToken(header);
  if (!token) {
    return err({
      reason: 'missing_credentials',
      message: header ? 'Malformed Authorization header' : 'Authorization header is missing',
    });
  }

  const decoded = tokenCodec.decodeAccess(token);
  if (!decoded.ok) return decoded;

  return ok(principalFromClaims(decoded.value));
}
