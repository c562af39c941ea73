import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';

import type { Database } from '../../src/shared/db/schema';

/**
 * WHY:
 * - DAL tests need to see the SQL the store sends to Postgres without a server.
 * - Every query is recorded; results are always empty unless a failure is queued.
 *
 * HOW TO USE:
 * - const pg = createScriptedPg()
 * - pg.failNextWith(err)   // next query rejects with err
 * - pg.queries             // [{ sql, parameters }]
 */

export type RecordedQuery = { sql: string; parameters: readonly unknown[] };

export function createScriptedPg() {
  const queries: RecordedQuery[] = [];
  const failures: Error[] = [];

  const connection: DatabaseConnection = {
    executeQuery(compiled: CompiledQuery): Promise<QueryResult<never>> {
      queries.push({ sql: compiled.sql, parameters: compiled.parameters });
      const failure = failures.shift();
      if (failure) return Promise.reject(failure);
      return Promise.resolve({ rows: [] });
    },
    async *streamQuery(): AsyncIterableIterator<QueryResult<never>> {
      throw new Error('streaming is not supported by the scripted driver');
    },
  };

  const driver: Driver = {
    init: () => Promise.resolve(),
    acquireConnection: () => Promise.resolve(connection),
    beginTransaction: () => Promise.resolve(),
    commitTransaction: () => Promise.resolve(),
    rollbackTransaction: () => Promise.resolve(),
    releaseConnection: () => Promise.resolve(),
    destroy: () => Promise.resolve(),
  };

  const db = new Kysely<Database>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return {
    db,
    queries,
    failNextWith(err: Error) {
      failures.push(err);
    },
  };
}

/** Shape of the error node-postgres raises for constraint violations. */
export function pgUniqueViolation(constraint: string): Error {
  const message = `duplicate key value violates unique constraint "${constraint}"`;
  return Object.assign(new Error(message), { code: '23505', constraint });
}
