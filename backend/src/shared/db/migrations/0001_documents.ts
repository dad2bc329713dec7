/**
 * src/shared/db/migrations/0001_documents.ts
 *
 * One jsonb table holds every collection. (collection, id) is the document key;
 * GIN index serves the `doc @> {...}` containment filters used by PgDocumentStore.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('documents')
    .addColumn('collection', 'text', (col) => col.notNull())
    .addColumn('id', 'text', (col) => col.notNull())
    .addColumn('doc', 'jsonb', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('documents_pkey', ['collection', 'id'])
    .execute();

  await sql`CREATE INDEX documents_doc_gin ON documents USING GIN (doc jsonb_path_ops)`.execute(db);
  await sql`CREATE INDEX documents_created_at ON documents (collection, (doc->>'created_at') DESC)`.execute(
    db,
  );
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('documents').ifExists().execute();
}
