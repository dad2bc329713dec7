/**
 * backend/src/modules/auth/helpers/load-user-record.ts
 *
 * WHY:
 * - Login, logout, refresh and /auth/me all start by reading one user document and
 *   must tell "no such user" (caller decides: 401 or 404) from "corrupt record" (500).
 *
 * RULES:
 * - ok(null): no document.
 * - err(USER_DATA_FORMAT_ERROR): document exists but does not parse; issues are logged.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { AppError } from '../../../shared/http/errors';
import type { Logger } from '../../../shared/logger/logger';
import { err, ok, type Result } from '../../../shared/result/result';

import { getUserByEmail, getUserById, parseUserDocument, UserErrors, type UserDocument } from '../../users';

export type UserLookup = { by: 'email'; email: string } | { by: 'id'; userId: string };

export async function loadUserRecord(
  deps: { store: DocumentStore; logger: Logger },
  lookup: UserLookup,
  ctx: { flow: string; requestId: string },
): Promise<Result<UserDocument | null, AppError>> {
  const raw =
    lookup.by === 'email'
      ? await getUserByEmail(deps.store, lookup.email)
      : await getUserById(deps.store, lookup.userId);
  if (!raw) return ok(null);

  const parsed = parseUserDocument(raw);
  if (!parsed.ok) {
    deps.logger.error({
      msg: 'auth.user.corrupt_record',
      flow: ctx.flow,
      requestId: ctx.requestId,
      userId: parsed.error.id,
      issues: parsed.error.issues,
    });
    return err(UserErrors.userDataFormatError({ userId: parsed.error.id }));
  }

  return ok(parsed.value);
}
