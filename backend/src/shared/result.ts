/**
 * backend/src/shared/result.ts
 *
 * WHY:
 * - Business outcomes that callers must branch on (conflict, not found, bad transition)
 *   are values, not exceptions.
 * - Unexpected failures (DB down, bugs) still throw and reach the error handler.
 *
 * HOW TO USE:
 * - return ok(value) / return err(UserErrors.userNotFound(...))
 * - if (!result.ok) { ... result.error ... }
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
