/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here.
 * - No AppError.
 * - No policies.
 * - password_hash and created_at are written on insert only.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint).
   * Callers should catch unique-violation.
   */
  async insertUser(params: {
    name: string;
    email: string;
    passwordHash: string;
    active: boolean;
    createdAt: Date;
    updatedAt: Date | null;
  }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        name: params.name,
        email: params.email,
        password_hash: params.passwordHash,
        active: params.active,
        created_at: params.createdAt,
        updated_at: params.updatedAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Overwrites the mutable columns of an existing user.
   * Returns undefined when no row has that id.
   */
  async updateUser(params: {
    id: number;
    name: string;
    email: string;
    active: boolean;
    updatedAt: Date | null;
  }): Promise<UserRow | undefined> {
    return this.db
      .updateTable('users')
      .set({
        name: params.name,
        email: params.email,
        active: params.active,
        updated_at: params.updatedAt,
      })
      .where('id', '=', params.id)
      .returningAll()
      .executeTakeFirst();
  }
}
