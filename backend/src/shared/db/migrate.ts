/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy jobs.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && 'up' in mod && typeof mod.up === 'function';
}

// Provider that loads TS migrations straight from the source folder (no dist/path confusion).
function sourceMigrationProvider(migrationsDir: string): MigrationProvider {
  return {
    async getMigrations() {
      const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

      logger.info('migrate.found_files', { count: files.length, files });

      const migrations: Record<string, Migration> = {};

      for (const file of files) {
        const mod: unknown = await import(pathToFileURL(path.join(migrationsDir, file)).href);
        if (!isMigration(mod)) {
          throw new Error(`Migration ${file} does not export an up() function`);
        }
        migrations[file.replace(/\.ts$/, '')] = mod;
      }

      return migrations;
    },
  };
}

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const db = createDb(config.databaseUrl);
  const migrator = new Migrator({
    db,
    provider: sourceMigrationProvider(path.join(process.cwd(), 'src/shared/db/migrations')),
  });

  try {
    const { error, results } = await migrator.migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success') logger.info('migrate.success', { migration: r.migrationName });
      if (r.status === 'Error') logger.error('migrate.error', { migration: r.migrationName });
    });

    if (error) throw error;

    logger.info('migrate.up_to_date');
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('migrate.failed', { err });
  process.exit(1);
});
