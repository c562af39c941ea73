/**
 * backend/src/shared/http/validate.ts
 *
 * WHY:
 * - Structural validation (presence, type, format, length) happens at the boundary,
 *   before any service runs.
 * - Controllers need a flat list of field/message pairs, not raw Zod issues.
 *
 * RULES:
 * - HTTP-only helper. No DB, no services.
 * - Returns a value; the controller decides to throw AppError.validationError.
 */

import type { z } from 'zod';
import type { FieldError } from './errors';

export type ValidationOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; errors: FieldError[] };

function fieldOf(path: readonly (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '_root';
}

export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): ValidationOutcome<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }

  return {
    ok: false,
    errors: parsed.error.issues.map((issue) => ({
      field: fieldOf(issue.path),
      message: issue.message,
    })),
  };
}

/**
 * Collapses field errors into the `errors` map of the response body.
 * The first message per field wins.
 */
export function toFieldErrorMap(errors: readonly FieldError[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const e of errors) {
    if (!(e.field in out)) out[e.field] = e.message;
  }
  return out;
}
