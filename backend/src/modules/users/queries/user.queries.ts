/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - Lookups return the RAW stored document; parseUserDocument() shapes it into a
 *   UserDocument. Keeping the two steps apart lets the login flow tell
 *   "no such user" (401) from "corrupt record" (500).
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DocumentStore, FindManyOptions, StoredDocument } from '../../../shared/store/document-store';
import type { Result } from '../../../shared/result/result';
import { parseDocument, type InvalidDocument } from '../../../shared/store/parse-document';
import { userDocumentSchema, type UserDocument } from '../user.types';

export function parseUserDocument(raw: StoredDocument): Result<UserDocument, InvalidDocument> {
  return parseDocument(userDocumentSchema, raw, 'user_id');
}

export function getUserById(store: DocumentStore, userId: string): Promise<StoredDocument | null> {
  return store.collection('users').findOne({ user_id: userId });
}

/** `email` must already be normalized (trimmed + lowercased). */
export function getUserByEmail(store: DocumentStore, email: string): Promise<StoredDocument | null> {
  return store.collection('users').findOne({ email });
}

export function getUserByUsername(store: DocumentStore, username: string): Promise<StoredDocument | null> {
  return store.collection('users').findOne({ username });
}

export async function isEmailTakenByOther(
  store: DocumentStore,
  email: string,
  userId: string,
): Promise<boolean> {
  const other = await store.collection('users').findOne({ email, user_id: { $ne: userId } });
  return other !== null;
}

export async function isUsernameTakenByOther(
  store: DocumentStore,
  username: string,
  userId: string,
): Promise<boolean> {
  const other = await store.collection('users').findOne({ username, user_id: { $ne: userId } });
  return other !== null;
}

export async function listUsers(
  store: DocumentStore,
  page: FindManyOptions,
): Promise<{ rows: StoredDocument[]; total: number }> {
  const users = store.collection('users');
  const [total, rows] = await Promise.all([users.count({}), users.findMany({}, page)]);
  return { rows, total };
}
