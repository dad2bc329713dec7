/**
 * backend/src/shared/result/result.ts
 *
 * WHY:
 * - The auth core (token decode, guard, predicates, login/logout/refresh) returns
 *   explicit success/failure values between steps instead of throwing.
 * - Only the controller boundary turns a failed Result into a thrown AppError.
 *
 * HOW TO USE:
 * - return ok(value) / return err(failure)
 * - if (!result.ok) return result;   // propagate unchanged
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Unwraps a Result at a throwing boundary (controllers, flows that end in HTTP). */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
