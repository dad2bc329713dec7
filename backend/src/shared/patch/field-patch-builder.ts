/**
 * backend/src/shared/patch/field-patch-builder.ts
 *
 * WHY:
 * - Partial updates only touch fields that ALREADY exist on the stored document.
 *   A client sending `profile.nickname` for a user document without that key is an
 *   error, not a silent insert.
 * - Each supplied field is checked against the existing document; problems are
 *   accumulated so the client sees every invalid field in one 400.
 *
 * HOW TO USE:
 *   const patch = new FieldPatchBuilder(existingDoc, 'organization')
 *     .field('name', input.name)
 *     .nested('address', input.address)
 *     .build(clock);
 *   if (!patch.ok) throw patch.error;
 *   await repo.update(id, patch.value);   // { 'name': ..., 'address.city': ..., updated_at }
 *
 * RULES:
 * - undefined/null input values mean "not supplied" and are skipped.
 * - `field()` replaces the value wholesale (scalars, arrays, free-form maps).
 * - `nested()` patches an object sub-field by sub-field using dotted paths.
 * - `updated_at` is always set; a patch with nothing else is NO_FIELDS_TO_UPDATE.
 */

import { AppError, type ErrorDetail } from '../http/errors';
import { err, ok, type Result } from '../result/result';
import { hasPath, isPlainObject } from '../store/document-paths';
import type { StoredDocument } from '../store/document-store';
import type { Clock } from '../time/clock';

export type PatchSet = Record<string, unknown>;

export class FieldPatchBuilder {
  private readonly set: PatchSet = {};
  private readonly invalid: string[] = [];

  constructor(
    private readonly existing: StoredDocument,
    private readonly entity: string,
  ) {}

  field(path: string, value: unknown): this {
    if (value === undefined || value === null) return this;

    if (!hasPath(this.existing, path)) {
      this.invalid.push(path);
      return this;
    }

    this.set[path] = value;
    return this;
  }

  nested(parent: string, value: Readonly<Record<string, unknown>> | null | undefined): this {
    if (value === undefined || value === null) return this;

    if (!hasPath(this.existing, parent)) {
      this.invalid.push(parent);
      return this;
    }

    for (const [key, subValue] of Object.entries(value)) {
      this.field(`${parent}.${key}`, subValue);
    }
    return this;
  }

  /**
   * Fields whose stored shape is either a string or an object (e.g. organization address):
   * a string input replaces wholesale, an object input is patched per sub-field.
   */
  stringOrNested(parent: string, value: string | Readonly<Record<string, unknown>> | null | undefined): this {
    if (typeof value === 'string') return this.field(parent, value);
    if (isPlainObject(value)) return this.nested(parent, value);
    return this;
  }

  /** Fields recorded so far (before updated_at); exposed for uniqueness checks. */
  has(path: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.set, path);
  }

  build(clock: Clock): Result<PatchSet, AppError> {
    if (this.invalid.length > 0) {
      const errors: ErrorDetail[] = this.invalid.map((field) => ({
        code: 'INVALID_FIELD',
        message: `Field '${field}' does not exist in ${this.entity} data structure`,
        field,
      }));

      return err(
        new AppError({
          status: 400,
          code: 'INVALID_FIELD',
          message: `Invalid fields provided: ${this.invalid.join(', ')}`,
          errors,
        }),
      );
    }

    if (Object.keys(this.set).length === 0) {
      return err(
        AppError.badRequest('NO_FIELDS_TO_UPDATE', 'No valid fields provided for update', {
          field: `${this.entity}_data`,
        }),
      );
    }

    return ok({ ...this.set, updated_at: clock().toISOString() });
  }
}
