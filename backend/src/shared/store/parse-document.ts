/**
 * backend/src/shared/store/parse-document.ts
 *
 * Stored documents are untyped JSON. Modules parse them with their own zod schema:
 * - parseDocument(): one record → Result (the caller picks the error for a corrupt record)
 * - parseDocuments(): list endpoints; corrupt records are reported through `onInvalid`
 *   and skipped so one bad row never fails a whole page.
 */

import type { z } from 'zod';
import { err, ok, type Result } from '../result/result';
import type { StoredDocument } from './document-store';

export type DocumentSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type InvalidDocument = Readonly<{
  /** Value of the collection's id field, when readable. */
  id: string | null;
  issues: string[];
}>;

function readId(raw: StoredDocument, idField: string): string | null {
  const value = raw[idField];
  return typeof value === 'string' ? value : null;
}

export function parseDocument<T>(
  schema: DocumentSchema<T>,
  raw: StoredDocument,
  idField: string,
): Result<T, InvalidDocument> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return ok(parsed.data);

  return err({
    id: readId(raw, idField),
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

export function parseDocuments<T>(
  schema: DocumentSchema<T>,
  rows: readonly StoredDocument[],
  idField: string,
  onInvalid: (invalid: InvalidDocument) => void,
): T[] {
  const out: T[] = [];
  for (const raw of rows) {
    const parsed = parseDocument(schema, raw, idField);
    if (parsed.ok) out.push(parsed.value);
    else onInvalid(parsed.error);
  }
  return out;
}
