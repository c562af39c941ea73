/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = [
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'CONFLICT',
  'INVALID_STATE',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

/**
 * One structural validation problem, keyed by the offending input field.
 */
export type FieldError = {
  field: string;
  message: string;
};

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly fieldErrors?: readonly FieldError[];

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    fieldErrors?: readonly FieldError[];
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.fieldErrors = opts.fieldErrors;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(fieldErrors: readonly FieldError[], message = 'Validation failed') {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, fieldErrors });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta });
  }

  // Illegal lifecycle transitions have no dedicated status; they surface as a server error.
  static invalidState(message = 'Invalid state', meta?: AppErrorMeta) {
    return new AppError({ code: 'INVALID_STATE', status: 500, message, meta });
  }
}
