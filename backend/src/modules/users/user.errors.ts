/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - The service returns these as Result errors; only the controller turns them
 *   into AppError (HTTP transport).
 *
 * RULES:
 * - Messages are human-readable descriptions, never user-facing formatting.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type UserErrorKind = 'EMAIL_ALREADY_EXISTS' | 'USER_NOT_FOUND' | 'INVALID_STATE';

export type UserError = {
  kind: UserErrorKind;
  message: string;
  meta?: AppErrorMeta;
};

export const UserErrors = {
  emailAlreadyExists(email: string): UserError {
    return {
      kind: 'EMAIL_ALREADY_EXISTS',
      message: `Email ${email} is already in use`,
    };
  },

  userNotFound(meta: { id?: number; email?: string }): UserError {
    const message =
      meta.id !== undefined
        ? `User with id ${meta.id} not found`
        : `User with email ${meta.email ?? ''} not found`;
    return { kind: 'USER_NOT_FOUND', message, meta };
  },

  alreadyActive(id: number): UserError {
    return { kind: 'INVALID_STATE', message: 'User is already active', meta: { id } };
  },
} as const;

export function toAppError(error: UserError): AppError {
  switch (error.kind) {
    case 'EMAIL_ALREADY_EXISTS':
      return AppError.conflict(error.message, error.meta);
    case 'USER_NOT_FOUND':
      return AppError.notFound(error.message, error.meta);
    case 'INVALID_STATE':
      return AppError.invalidState(error.message, error.meta);
  }
}
