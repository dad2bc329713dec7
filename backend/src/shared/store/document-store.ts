/**
 * backend/src/shared/store/document-store.ts
 *
 * WHY:
 * - Users, organizations, business units, projects and modules are stored as whole
 *   JSON documents keyed by their own id (user_id, org_id, ...).
 * - Repos depend on this interface; PgDocumentStore (kysely + jsonb) runs in dev/prod,
 *   InMemDocumentStore runs in tests and with STORE_DRIVER=memory.
 *
 * FILTER SEMANTICS (both implementations):
 * - Keys are field names or dotted paths ("security.password_hash").
 * - A plain value means strict equality (arrays are NOT searched element-wise).
 *   `null` also matches a missing field.
 * - { $ne: v } is the negation of equality; { $in: [...] } matches any listed value.
 * - All conditions in one filter are AND-ed.
 *
 * RULES:
 * - No multi-document transactions. Callers must tolerate partial failure between calls.
 * - findMany() returns newest `created_at` first.
 * - updateOne() `set` keys may be dotted paths; missing intermediate objects are created.
 */

import { z } from 'zod';

export type CollectionName = 'users' | 'organizations' | 'business_units' | 'projects' | 'modules';

export type Scalar = string | number | boolean | null;

export type FieldCondition =
  | Scalar
  | Readonly<{ $ne: Scalar }>
  | Readonly<{ $in: readonly Scalar[] }>;

export type DocumentFilter = Readonly<Record<string, FieldCondition>>;

export type StoredDocument = Record<string, unknown>;

export const storedDocumentSchema = z.record(z.unknown());

export type FindManyOptions = Readonly<{ limit: number; skip: number }>;

export interface DocumentCollection {
  findOne(filter: DocumentFilter): Promise<StoredDocument | null>;
  findMany(filter: DocumentFilter, opts: FindManyOptions): Promise<StoredDocument[]>;
  count(filter: DocumentFilter): Promise<number>;

  /** Throws DuplicateDocumentError when `id` already exists. */
  insertOne(id: string, doc: StoredDocument): Promise<void>;

  /** Returns true when a document matched (even if the values were unchanged). */
  updateOne(filter: DocumentFilter, set: Readonly<Record<string, unknown>>): Promise<boolean>;
  deleteOne(filter: DocumentFilter): Promise<boolean>;

  /** Appends `value` to the array at `field` unless already present. */
  addToSet(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean>;
  /** Removes every occurrence of `value` from the array at `field`. */
  pull(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean>;
}

export interface DocumentStore {
  collection(name: CollectionName): DocumentCollection;
  close(): Promise<void>;
}
