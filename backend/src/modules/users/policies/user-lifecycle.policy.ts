/**
 * backend/src/modules/users/policies/user-lifecycle.policy.ts
 *
 * WHY:
 * - Centralizes the soft-delete state machine (active <-> inactive).
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Return a Result (the loaded user when the transition is allowed); never throw.
 *
 * NOTE:
 * - Deactivating an already inactive user reports USER_NOT_FOUND (inactive users are
 *   "not found" everywhere else too), while reactivating an already active user
 *   reports INVALID_STATE.
 */

import { err, ok, type Result } from '../../../shared/result';
import { UserErrors, type UserError } from '../user.errors';
import type { UserId, UserRecord } from '../user.types';

export function checkCanDeactivate(
  user: UserRecord | undefined,
  id: UserId,
): Result<UserRecord, UserError> {
  if (!user || !user.active) return err(UserErrors.userNotFound({ id }));
  return ok(user);
}

export function checkCanReactivate(
  user: UserRecord | undefined,
  id: UserId,
): Result<UserRecord, UserError> {
  if (!user) return err(UserErrors.userNotFound({ id }));
  if (user.active) return err(UserErrors.alreadyActive(id));
  return ok(user);
}

/**
 * True when `nextEmail` (already normalized) differs from the user's current email,
 * i.e. when the update needs a uniqueness check.
 */
export function emailChanges(current: UserRecord, nextEmail: string): boolean {
  return nextEmail.length > 0 && nextEmail !== current.email;
}
