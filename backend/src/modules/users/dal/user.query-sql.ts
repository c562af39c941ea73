/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Emails are expected normalized by the caller.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

// LIKE treats % and _ as wildcards; a name fragment must match them literally.
function escapeLike(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectActiveUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('id', '=', userId)
    .where('active', '=', true)
    .executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectUserIdByEmailSql(
  db: DbExecutor,
  params: { email: string; excludeId?: number },
): Promise<number | undefined> {
  let query = db.selectFrom('users').select('id').where('email', '=', params.email);
  if (params.excludeId !== undefined) {
    query = query.where('id', '<>', params.excludeId);
  }

  const row = await query.limit(1).executeTakeFirst();
  return row?.id;
}

export async function selectActiveUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('users').selectAll().where('active', '=', true).orderBy('id').execute();
}

export async function selectUsersByNameFragmentSql(
  db: DbExecutor,
  fragment: string,
): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('name', 'ilike', `%${escapeLike(fragment)}%`)
    .orderBy('id')
    .execute();
}
