/**
 * backend/src/shared/http/validation.ts
 *
 * WHY:
 * - Controllers validate bodies/params with Zod and must turn a ZodError into the
 *   standard 400 envelope with one error detail per offending field.
 * - Update payloads are strict schemas: unknown top-level keys surface as
 *   INVALID_FIELD details rather than a generic validation error.
 *
 * HOW TO USE:
 *   const parsed = schema.safeParse(req.body);
 *   if (!parsed.success) throw toValidationError(parsed.error);
 */

import type { ZodError, ZodIssue } from 'zod';
import { AppError, type ErrorDetail } from './errors';

function issuePath(issue: ZodIssue): string | null {
  return issue.path.length ? issue.path.join('.') : null;
}

export function toErrorDetails(issues: readonly ZodIssue[]): ErrorDetail[] {
  const details: ErrorDetail[] = [];

  for (const issue of issues) {
    if (issue.code === 'unrecognized_keys') {
      const prefix = issuePath(issue);
      for (const key of issue.keys) {
        const field = prefix ? `${prefix}.${key}` : key;
        details.push({
          code: 'INVALID_FIELD',
          message: `Field '${field}' is not a valid top-level field`,
          field,
        });
      }
      continue;
    }

    details.push({ code: 'VALIDATION_ERROR', message: issue.message, field: issuePath(issue) });
  }

  return details;
}

export function toValidationError(error: ZodError, message = 'Invalid request body'): AppError {
  const details = toErrorDetails(error.issues);

  const onlyUnknownFields = details.length > 0 && details.every((d) => d.code === 'INVALID_FIELD');
  if (onlyUnknownFields) {
    const fields = details.map((d) => d.field ?? '').join(', ');
    return new AppError({
      status: 400,
      code: 'INVALID_FIELD',
      message: `Invalid top-level fields provided: ${fields}`,
      errors: details,
    });
  }

  return AppError.validationError(message, details);
}
