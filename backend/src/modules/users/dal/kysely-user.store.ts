/**
 * backend/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Postgres implementation of UserStore (reads via user.query-sql, writes via UserRepo).
 * - Shapes DB rows into UserRecord so snake_case never leaves the DAL.
 * - Translates the users_email_key unique violation into UniqueEmailViolation.
 */

import { isUniqueViolation, type DbExecutor } from '../../../shared/db/db';
import type { UnsavedUser, UserId, UserRecord } from '../user.types';
import { UserRepo } from './user.repo';
import {
  selectActiveUserByIdSql,
  selectActiveUsersSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserIdByEmailSql,
  selectUsersByNameFragmentSql,
  type UserRow,
} from './user.query-sql';
import { UniqueEmailViolation, isUnsaved, type UserStore } from './user.store';

const EMAIL_UNIQUE_CONSTRAINT = 'users_email_key';

export function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? null,
  };
}

export class KyselyUserStore implements UserStore {
  private readonly repo: UserRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new UserRepo(db);
  }

  async save(record: UserRecord | UnsavedUser): Promise<UserRecord> {
    try {
      if (isUnsaved(record)) {
        return toUserRecord(await this.repo.insertUser(record));
      }

      const row = await this.repo.updateUser(record);
      if (!row) {
        throw new Error(`Cannot save user ${record.id}: no such row`);
      }
      return toUserRecord(row);
    } catch (err: unknown) {
      if (isUniqueViolation(err, EMAIL_UNIQUE_CONSTRAINT)) {
        throw new UniqueEmailViolation(record.email);
      }
      throw err;
    }
  }

  async findById(id: UserId): Promise<UserRecord | undefined> {
    const row = await selectUserByIdSql(this.db, id);
    return row ? toUserRecord(row) : undefined;
  }

  async findByIdActiveOnly(id: UserId): Promise<UserRecord | undefined> {
    const row = await selectActiveUserByIdSql(this.db, id);
    return row ? toUserRecord(row) : undefined;
  }

  async findByEmail(email: string): Promise<UserRecord | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    return row ? toUserRecord(row) : undefined;
  }

  async existsByEmail(email: string): Promise<boolean> {
    return (await selectUserIdByEmailSql(this.db, { email })) !== undefined;
  }

  async existsByEmailExcludingId(email: string, id: UserId): Promise<boolean> {
    return (await selectUserIdByEmailSql(this.db, { email, excludeId: id })) !== undefined;
  }

  async listActive(): Promise<UserRecord[]> {
    const rows = await selectActiveUsersSql(this.db);
    return rows.map(toUserRecord);
  }

  async findByNameContains(fragment: string): Promise<UserRecord[]> {
    const rows = await selectUsersByNameFragmentSql(this.db, fragment);
    return rows.map(toUserRecord);
  }
}
