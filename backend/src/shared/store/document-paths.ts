/**
 * backend/src/shared/store/document-paths.ts
 *
 * Dotted-path helpers shared by the store implementations and the field patch builder.
 */

import type { DocumentFilter, FieldCondition, Scalar, StoredDocument } from './document-store';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

export function hasPath(doc: Record<string, unknown>, path: string): boolean {
  let current: unknown = doc;
  for (const segment of splitPath(path)) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return false;
    }
    current = current[segment];
  }
  return true;
}

export function getPath(doc: Record<string, unknown>, path: string): unknown {
  let current: unknown = doc;
  for (const segment of splitPath(path)) {
    if (!isPlainObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/** Writes `value` at `path`, replacing non-object intermediates with fresh objects. */
export function setPath(doc: Record<string, unknown>, path: string, value: unknown): void {
  const segments = splitPath(path);
  const last = segments.pop();
  if (last === undefined) return;

  let current = doc;
  for (const segment of segments) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

function equalsScalar(actual: unknown, expected: Scalar): boolean {
  if (expected === null) return actual === null || actual === undefined;
  return actual === expected;
}

export function matchesCondition(actual: unknown, condition: FieldCondition): boolean {
  if (isPlainObject(condition)) {
    if ('$ne' in condition) return !equalsScalar(actual, condition.$ne);
    return condition.$in.some((candidate) => equalsScalar(actual, candidate));
  }
  return equalsScalar(actual, condition);
}

export function matchesFilter(doc: StoredDocument, filter: DocumentFilter): boolean {
  return Object.entries(filter).every(([path, condition]) =>
    matchesCondition(getPath(doc, path), condition),
  );
}

/** Newest first by ISO `created_at`; documents without one sort last. */
export function compareByCreatedAtDesc(a: StoredDocument, b: StoredDocument): number {
  const left = typeof a.created_at === 'string' ? a.created_at : '';
  const right = typeof b.created_at === 'string' ? b.created_at : '';
  if (left === right) return 0;
  return left < right ? 1 : -1;
}
