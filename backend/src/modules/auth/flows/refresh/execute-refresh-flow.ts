/**
 * backend/src/modules/auth/flows/refresh/execute-refresh-flow.ts
 *
 * WHY:
 * - Exchanges a refresh token for a new access token.
 * - Refresh tokens carry no roles: the new access token gets the roles stored on the
 *   user record NOW, so role changes take effect on the next refresh.
 *
 * STEPS:
 * 1. decode the refresh token                        → 401 INVALID_TOKEN
 * 2. its subject must be the authenticated caller    → 401 INVALID_TOKEN
 * 3. user still exists                               → 401 INVALID_TOKEN
 * 4. account status (same checks as login step 5)    → 403
 * 5. issue access token with current roles           → 500 TOKEN_GENERATION_ERROR
 *
 * RULES:
 * - Never log the tokens.
 */

import type { DocumentStore } from '../../../../shared/store/document-store';
import type { AppError } from '../../../../shared/http/errors';
import { AccessErrors } from '../../../../shared/http/access-errors';
import type { Principal } from '../../../../shared/security/principal';
import type { TokenCodec } from '../../../../shared/security/token-codec';
import { TokenIssuanceError } from '../../../../shared/security/security.errors';
import type { Logger } from '../../../../shared/logger/logger';
import { err, ok, type Result } from '../../../../shared/result/result';

import { AuthErrors } from '../../auth.errors';
import type { RefreshedAccess } from '../../auth.types';
import { effectiveRoles } from '../../helpers/effective-roles';
import { loadUserRecord } from '../../helpers/load-user-record';
import { getAccountStatusFailure } from '../../policies/account-status.policy';

const FLOW = 'auth.refresh';

export async function executeRefreshFlow(
  deps: { store: DocumentStore; tokenCodec: TokenCodec; logger: Logger },
  params: { principal: Principal; refreshToken: string; requestId: string },
): Promise<Result<RefreshedAccess, AppError>> {
  const fail = (reason: string, error: AppError) => {
    deps.logger.warn({
      msg: 'auth.refresh.failed',
      flow: FLOW,
      requestId: params.requestId,
      userId: params.principal.userId,
      reason,
    });
    return err(error);
  };

  // 1)
  const decoded = deps.tokenCodec.decodeRefresh(params.refreshToken);
  if (!decoded.ok) {
    return fail(decoded.error.reason, AccessErrors.invalidCredentials({ reason: decoded.error.reason }));
  }

  // 2)
  const subject = decoded.value.user_id;
  if (subject !== params.principal.userId) {
    return fail('subject_mismatch', AccessErrors.invalidCredentials({ reason: 'subject_mismatch' }));
  }

  // 3)
  const loaded = await loadUserRecord(
    deps,
    { by: 'id', userId: subject },
    { flow: FLOW, requestId: params.requestId },
  );
  if (!loaded.ok) return loaded;

  const user = loaded.value;
  if (!user) {
    return fail('user_not_found', AccessErrors.invalidCredentials({ reason: 'user_not_found' }));
  }

  // 4)
  const statusFailure = getAccountStatusFailure(user);
  if (statusFailure) return fail(statusFailure.reason, statusFailure.error);

  // 5)
  let refreshed: ReturnType<TokenCodec['refreshAccess']>;
  try {
    refreshed = deps.tokenCodec.refreshAccess(params.refreshToken, effectiveRoles(user.roles));
  } catch (error) {
    if (!(error instanceof TokenIssuanceError)) throw error;
    deps.logger.error({
      msg: 'auth.refresh.token_generation_failed',
      flow: FLOW,
      requestId: params.requestId,
      userId: subject,
      error: error.message,
    });
    return err(AuthErrors.tokenGenerationFailed());
  }
  if (!refreshed.ok) {
    return fail(refreshed.error.reason, AccessErrors.invalidCredentials({ reason: refreshed.error.reason }));
  }

  deps.logger.info({ msg: 'auth.refresh.success', flow: FLOW, requestId: params.requestId, userId: subject });

  return ok({
    access_token: refreshed.value,
    token_type: 'Bearer',
    expires_in: deps.tokenCodec.accessTtlSeconds,
  });
}
