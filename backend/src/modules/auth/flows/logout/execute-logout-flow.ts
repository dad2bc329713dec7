/**
 * backend/src/modules/auth/flows/logout/execute-logout-flow.ts
 *
 * WHY:
 * - Mirror of login's bookkeeping: clears `is_logged_in` for the caller.
 *
 * RULES:
 * - Idempotent: a user already logged out gets success with no store write.
 * - Does NOT invalidate the access token; tokens stay valid until they expire.
 */

import type { DocumentStore } from '../../../../shared/store/document-store';
import type { AppError } from '../../../../shared/http/errors';
import type { Principal } from '../../../../shared/security/principal';
import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';
import { err, ok, type Result } from '../../../../shared/result/result';

import { UserErrors, type UserRepo } from '../../../users';
import { loadUserRecord } from '../../helpers/load-user-record';

const FLOW = 'auth.logout';

export type LogoutOutcome = 'logged_out' | 'already_logged_out';

export async function executeLogoutFlow(
  deps: { store: DocumentStore; userRepo: UserRepo; logger: Logger; clock: Clock },
  params: { principal: Principal; requestId: string },
): Promise<Result<LogoutOutcome, AppError>> {
  const userId = params.principal.userId;

  const loaded = await loadUserRecord(deps, { by: 'id', userId }, { flow: FLOW, requestId: params.requestId });
  if (!loaded.ok) return loaded;

  if (!loaded.value) {
    deps.logger.warn({ msg: 'auth.logout.user_not_found', flow: FLOW, requestId: params.requestId, userId });
    return err(UserErrors.userNotFound({ userId }));
  }

  if (!loaded.value.is_logged_in) {
    deps.logger.info({ msg: 'auth.logout.already_logged_out', flow: FLOW, requestId: params.requestId, userId });
    return ok('already_logged_out');
  }

  const updated = await deps.userRepo.markLoggedOut(userId, deps.clock().toISOString());
  if (!updated) return err(UserErrors.userNotFound({ userId }));

  deps.logger.info({ msg: 'auth.logout.success', flow: FLOW, requestId: params.requestId, userId });
  return ok('logged_out');
}
