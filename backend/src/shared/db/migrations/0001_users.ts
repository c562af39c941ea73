/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - Users are soft-deleted (active flag), never removed.
 * - Email uniqueness is enforced here as well as in the service, so two concurrent
 *   creates with the same email cannot both succeed.
 * - updated_at stays NULL until the first mutation.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz')
    .execute();

  await db.schema.createIndex('users_active_idx').on('users').column('active').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
