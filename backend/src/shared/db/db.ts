/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (kept aligned with migrations).
 *
 * HOW TO USE:
 * - Created once in app/di.ts; destroyed on shutdown via deps.close().
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { Database } from './schema';

export type Db = Kysely<Database>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<Database>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}

const PG_UNIQUE_VIOLATION = '23505';

/**
 * True when `err` is a Postgres unique-constraint violation,
 * optionally on a specific constraint name.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!(err instanceof Error) || !('code' in err) || err.code !== PG_UNIQUE_VIOLATION) {
    return false;
  }
  if (!constraint) return true;
  return 'constraint' in err && err.constraint === constraint;
}
