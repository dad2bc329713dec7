/**
 * backend/src/shared/store/inmem-document-store.ts
 *
 * WHY:
 * - Allows tests (and local dev with STORE_DRIVER=memory) to run without Postgres.
 * - Same filter/sort/update semantics as PgDocumentStore (see document-store.ts).
 *
 * HOW TO USE:
 * - const store = new InMemDocumentStore()
 * - store.collection('users').insertOne(userId, doc)
 *
 * RULES:
 * - Documents are deep-copied on the way in and out, so callers can't mutate stored state.
 */

import type {
  CollectionName,
  DocumentCollection,
  DocumentFilter,
  DocumentStore,
  FindManyOptions,
  Scalar,
  StoredDocument,
} from './document-store';
import { compareByCreatedAtDesc, getPath, matchesFilter, setPath } from './document-paths';
import { DuplicateDocumentError } from './store.errors';

type Entry = { id: string; seq: number; doc: StoredDocument };

class InMemCollection implements DocumentCollection {
  private readonly entries = new Map<string, Entry>();
  private seq = 0;

  constructor(private readonly name: CollectionName) {}

  private matching(filter: DocumentFilter): Entry[] {
    return Array.from(this.entries.values()).filter((entry) => matchesFilter(entry.doc, filter));
  }

  findOne(filter: DocumentFilter): Promise<StoredDocument | null> {
    const [first] = this.matching(filter);
    return Promise.resolve(first ? structuredClone(first.doc) : null);
  }

  findMany(filter: DocumentFilter, opts: FindManyOptions): Promise<StoredDocument[]> {
    const sorted = this.matching(filter)
      .sort((a, b) => b.seq - a.seq)
      .sort((a, b) => compareByCreatedAtDesc(a.doc, b.doc));

    return Promise.resolve(
      sorted.slice(opts.skip, opts.skip + opts.limit).map((entry) => structuredClone(entry.doc)),
    );
  }

  count(filter: DocumentFilter): Promise<number> {
    return Promise.resolve(this.matching(filter).length);
  }

  insertOne(id: string, doc: StoredDocument): Promise<void> {
    if (this.entries.has(id)) {
      return Promise.reject(new DuplicateDocumentError(this.name, id));
    }
    this.seq += 1;
    this.entries.set(id, { id, seq: this.seq, doc: structuredClone(doc) });
    return Promise.resolve();
  }

  updateOne(filter: DocumentFilter, set: Readonly<Record<string, unknown>>): Promise<boolean> {
    const [target] = this.matching(filter);
    if (!target) return Promise.resolve(false);

    for (const [path, value] of Object.entries(set)) {
      setPath(target.doc, path, structuredClone(value));
    }
    return Promise.resolve(true);
  }

  deleteOne(filter: DocumentFilter): Promise<boolean> {
    const [target] = this.matching(filter);
    if (!target) return Promise.resolve(false);

    this.entries.delete(target.id);
    return Promise.resolve(true);
  }

  addToSet(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean> {
    const [target] = this.matching(filter);
    if (!target) return Promise.resolve(false);

    const current = getPath(target.doc, field);
    const list = Array.isArray(current) ? current : [];
    if (!list.includes(value)) {
      setPath(target.doc, field, [...list, value]);
    }
    return Promise.resolve(true);
  }

  pull(filter: DocumentFilter, field: string, value: Scalar): Promise<boolean> {
    const [target] = this.matching(filter);
    if (!target) return Promise.resolve(false);

    const current = getPath(target.doc, field);
    if (Array.isArray(current)) {
      setPath(
        target.doc,
        field,
        current.filter((item: unknown) => item !== value),
      );
    }
    return Promise.resolve(true);
  }
}

export class InMemDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, InMemCollection>();

  collection(name: CollectionName): DocumentCollection {
    let existing = this.collections.get(name);
    if (!existing) {
      existing = new InMemCollection(name);
      this.collections.set(name, existing);
    }
    return existing;
  }

  close(): Promise<void> {
    this.collections.clear();
    return Promise.resolve();
  }
}
