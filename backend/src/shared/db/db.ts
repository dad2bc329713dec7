/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Only PgDocumentStore and the migration runner touch Kysely directly; modules go
 *   through the DocumentStore interface.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { Database } from './database.schema';

export type Db = Kysely<Database>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}
