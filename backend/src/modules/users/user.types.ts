/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - The store speaks UserRecord; HTTP speaks UserResponse. The mapper is the only bridge.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash never appears in UserResponse.
 */

export type UserId = number;

export type UserRecord = {
  id: UserId;
  name: string;
  email: string;
  passwordHash: string;
  active: boolean;

  createdAt: Date;
  updatedAt: Date | null;
};

/** A record that has not been saved yet: the store assigns the id. */
export type UnsavedUser = Omit<UserRecord, 'id'> & { id: null };

/** What the mapper builds from create input; the service adds passwordHash. */
export type UserDraft = Omit<UnsavedUser, 'passwordHash'>;

export type UserResponse = {
  id: UserId;
  name: string;
  email: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date | null;
};

export type CreateUserInput = {
  name: string;
  email: string;
  password: string;
};

export type UpdateUserInput = {
  name?: string | null;
  email?: string | null;
};
