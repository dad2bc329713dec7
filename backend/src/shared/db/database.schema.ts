/**
 * backend/src/shared/db/database.schema.ts
 *
 * WHY:
 * - Kysely table typing for the single `documents` table (see migrations/0001_documents.ts).
 * - Written by hand: the schema is one generic jsonb table, so there is nothing to
 *   generate. Keep it in sync with the migrations.
 */

import type { ColumnType, Generated } from 'kysely';

export interface DocumentsTable {
  collection: string;
  id: string;
  /** Selected as parsed JSON (validated by the store), written as a JSON string. */
  doc: ColumnType<unknown, string, string>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface Database {
  documents: DocumentsTable;
}
