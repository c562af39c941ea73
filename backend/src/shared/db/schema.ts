/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Kept in lockstep with migrations/ by hand; one table, so no codegen step.
 *
 * RULES:
 * - snake_case column names, exactly as in Postgres.
 * - Only DAL files import these row types.
 */

import type { ColumnType, Generated } from 'kysely';

export interface UsersTable {
  id: Generated<number>;
  name: string;
  email: string;
  // Written on insert only; the update statement never sets it.
  password_hash: ColumnType<string, string, never>;
  active: Generated<boolean>;
  created_at: ColumnType<Date, Date | undefined, never>;
  updated_at: Date | null;
}

export interface Database {
  users: UsersTable;
}
