/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Store failures propagate as StoreUnavailableError; the caller decides whether a
 *   write is best-effort (login bookkeeping) or must fail the request.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { PatchSet } from '../../../shared/patch/field-patch-builder';
import type { UserDocument } from '../user.types';

export class UserRepo {
  constructor(private readonly store: DocumentStore) {}

  private get users() {
    return this.store.collection('users');
  }

  /** Throws DuplicateDocumentError when user_id is taken. */
  async insertUser(user: UserDocument): Promise<void> {
    await this.users.insertOne(user.user_id, { ...user });
  }

  updateUser(userId: string, set: PatchSet): Promise<boolean> {
    return this.users.updateOne({ user_id: userId }, set);
  }

  deleteUser(userId: string): Promise<boolean> {
    return this.users.deleteOne({ user_id: userId });
  }

  markLoggedIn(userId: string, at: string): Promise<boolean> {
    return this.users.updateOne(
      { user_id: userId },
      {
        'security.last_login': at,
        'metadata.last_activity': at,
        updated_at: at,
        is_logged_in: true,
      },
    );
  }

  markLoggedOut(userId: string, at: string): Promise<boolean> {
    return this.users.updateOne(
      { user_id: userId },
      {
        'metadata.last_activity': at,
        updated_at: at,
        is_logged_in: false,
      },
    );
  }
}
