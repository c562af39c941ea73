/**
 * backend/src/modules/users/dal/user.store.ts
 *
 * WHY:
 * - The service depends on this abstraction, not on Kysely directly (DIP).
 * - Tests and local runs without Postgres use InMemUserStore.
 *
 * HOW TO USE:
 * - await store.save({ id: null, ... })   // insert, id assigned
 * - await store.save(existingRecord)       // overwrite by id
 * - await store.findByIdActiveOnly(id)
 *
 * RULES:
 * - No AppError, no policies, no business rules.
 * - Emails passed in are already normalized (trimmed + lowercased).
 * - save() never changes passwordHash or createdAt of an existing record.
 * - Implementations enforce unique email themselves and throw UniqueEmailViolation.
 */

import type { UnsavedUser, UserId, UserRecord } from '../user.types';

export interface UserStore {
  save(record: UserRecord | UnsavedUser): Promise<UserRecord>;

  findById(id: UserId): Promise<UserRecord | undefined>;
  findByIdActiveOnly(id: UserId): Promise<UserRecord | undefined>;
  findByEmail(email: string): Promise<UserRecord | undefined>;

  existsByEmail(email: string): Promise<boolean>;
  existsByEmailExcludingId(email: string, id: UserId): Promise<boolean>;

  /** Active records, ordered by id. */
  listActive(): Promise<UserRecord[]>;

  /** Case-insensitive substring match on name, active or not, ordered by id. */
  findByNameContains(fragment: string): Promise<UserRecord[]>;
}

/**
 * Raised by save() when another record already holds the email.
 * Closes the gap between the service's existence check and the write.
 */
export class UniqueEmailViolation extends Error {
  constructor(readonly email: string) {
    super('Unique email constraint violated');
    this.name = 'UniqueEmailViolation';
  }
}

export function isUnsaved(record: UserRecord | UnsavedUser): record is UnsavedUser {
  return record.id === null;
}
