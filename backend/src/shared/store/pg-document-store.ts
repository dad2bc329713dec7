/**
 * backend/src/shared/store/pg-document-store.ts
 *
 * WHY:
 * - Production DocumentStore: every collection lives in the `documents` jsonb table
 *   (migrations/0001_documents.ts), queried through Kysely.
 *
 * HOW IT WORKS:
 * - Equality filters compile to `doc @> '{"a":{"b":value}}'` (GIN-indexed containment).
 * - null equality compiles to "path missing OR json null".
 * - Updates are read-modify-write inside one transaction with SELECT ... FOR UPDATE,
 *   so dotted-path `set`s and array add/pull apply atomically per document.
 *
 * RULES:
 * - Any driver failure is wrapped in StoreUnavailableError (never leaks pg details).
 * - Unique violations on insert become DuplicateDocumentError.
 */

import { sql, type RawBuilder, type Transaction } from 'kysely';

import type { Db } from '../db/db';
import type { Database } from '../db/database.schema';
import {
  storedDocumentSchema,
  type CollectionName,
  type DocumentCollection,
  type DocumentFilter,
  type DocumentStore,
  type FieldCondition,
  type FindManyOptions,
  type Scalar,
  type StoredDocument,
} from './document-store';
import { getPath, isPlainObject, setPath, splitPath } from './document-paths';
import { DuplicateDocumentError, StoreUnavailableError, type StoreOperation } from './store.errors';

function nestUnder(path: string, value: Scalar): unknown {
  return splitPath(path).reduceRight<unknown>((inner, segment) => ({ [segment]: inner }), value);
}

function equalitySql(path: string, value: Scalar): RawBuilder<boolean> {
  if (value === null) {
    const segments = splitPath(path);
    return sql<boolean>`(doc #> ${segments}::text[] IS NULL OR doc #> ${segments}::text[] = 'null'::jsonb)`;
  }
  return sql<boolean>`doc @> ${JSON.stringify(nestUnder(path, value))}::jsonb`;
}

function conditionSql(path: string, condition: FieldCondition): RawBuilder<boolean> {
  if (isPlainObject(condition)) {
    if ('$ne' in condition) return sql<boolean>`NOT ${equalitySql(path, condition.$ne)}`;
    if (condition.$in.length === 0) return sql<boolean>`false`;
    const options = condition.$in.map((candidate) => equalitySql(path, candidate));
    return sql<boolean>`(${sql.join(options, sql` OR `)})`;
  }
  return equalitySql(path, condition);
}

function whereSql(collection: CollectionName, filter: DocumentFilter): RawBuilder<boolean> {
  const parts = [
    sql<boolean>`collection = ${collection}`,
    ...Object.entries(filter).map(([path, condition]) => conditionSql(path, condition)),
  ];
  return sql<boolean>`${sql.join(parts, sql` AND `)}`;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === '23505';
}

class PgCollection implements DocumentCollection {
  constructor(
    private readonly db: Db,
    private readonly name: CollectionName,
  ) {}

  private async run<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DuplicateDocumentError) throw error;
      throw new StoreUnavailableError(operation, this.name, { cause: error });
    }
  }

  findOne(filter: DocumentFilter): Promise<StoredDocument | null> {
    return this.run('findOne', async () => {
      const row = await this.db
        .selectFrom('documents')
        .select('doc')
        .where(whereSql(this.name, filter))
        .limit(1)
        .executeTakeFirst();

      return row ? storedDocumentSchema.parse(row.doc) : null;
    });
  }

  findMany(filter: DocumentFilter, opts: FindManyOptions): Promise<StoredDocument[]> {
    return this.run('findMany', async () => {
      const rows = await this.db
        .selectFrom('documents')
        .select('doc')
        .where(whereSql(this.name, filter))
        .orderBy(sql`doc->>'created_at'`, 'desc')
        .orderBy('created_at', 'desc')
        .limit(opts.limit)
        .offset(opts.skip)
        .execute();

      return rows.map((row) => storedDocumentSchema.parse(row.doc));
    });
  }

  count(filter: DocumentFilter): Promise<number> {
    return this.run('count', async () => {
      const row = await this.db
        .selectFrom('documents')
        .select((eb) => eb.fn.countAll<string | number>().as('count'))
        .where(whereSql(this.name, filter))
        .executeTakeFirstOrThrow();

      return Number(row.count);
    });
  }

  insertOne(id: string, doc: StoredDocument): Promise<void> {
    return this.run('insertOne', async () => {
      try {
        await this.db
          .insertInto('documents')
          .values({ collection: this.name, id, doc: JSON.stringify(doc) })
          .execute();
      } catch (error) {
        if (isUniqueViolation(error)) throw new DuplicateDocumentError(this.name, id);
        throw error;
      }
    });
  }

  updateOne(filter: DocumentFilter, set: Readonly<Record<string, unknown>>): Promise<boolean> {
    return this.run('updateOne', () =>
      this.mutateOne(filter, (doc) => {
        for (const [path, value] of Object.entries(set)) setPath(doc, path, value);
      }),
    );
  }

  addToSet(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean> {
    return this.run('addToSet', () =>
      this.mutateOne(filter, (doc) => {
        const current = getPath(doc, field);
        const list: unknown[] = Array.isArray(current) ? current : [];
        if (!list.includes(value)) setPath(doc, field, [...list, value]);
      }),
    );
  }

  pull(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean> {
    return this.run('pull', () =>
      this.mutateOne(filter, (doc) => {
        const current = getPath(doc, field);
        if (Array.isArray(current)) {
          setPath(
            doc,
            field,
            current.filter((item: unknown) => item !== value),
          );
        }
      }),
    );
  }

  deleteOne(filter: DocumentFilter): Promise<boolean> {
    return this.run('deleteOne', async () => {
      const target = await this.db
        .selectFrom('documents')
        .select('id')
        .where(whereSql(this.name, filter))
        .limit(1)
        .executeTakeFirst();
      if (!target) return false;

      const result = await this.db
        .deleteFrom('documents')
        .where('collection', '=', this.name)
        .where('id', '=', target.id)
        .executeTakeFirst();

      return result.numDeletedRows > 0n;
    });
  }

  private mutateOne(filter: DocumentFilter, mutate: (doc: StoredDocument) => void): Promise<boolean> {
    return this.db.transaction().execute(async (trx: Transaction<Database>) => {
      const row = await trx
        .selectFrom('documents')
        .select(['id', 'doc'])
        .where(whereSql(this.name, filter))
        .limit(1)
        .forUpdate()
        .executeTakeFirst();
      if (!row) return false;

      const doc = storedDocumentSchema.parse(row.doc);
      mutate(doc);

      await trx
        .updateTable('documents')
        .set({ doc: JSON.stringify(doc), updated_at: sql<Date>`now()` })
        .where('collection', '=', this.name)
        .where('id', '=', row.id)
        .execute();

      return true;
    });
  }
}

export class PgDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, PgCollection>();

  constructor(private readonly db: Db) {}

  collection(name: CollectionName): DocumentCollection {
    let existing = this.collections.get(name);
    if (!existing) {
      existing = new PgCollection(this.db, name);
      this.collections.set(name, existing);
    }
    return existing;
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
