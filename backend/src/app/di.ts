/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool) and shares them safely.
 * - Keeps modules testable (tests run with USER_STORE=memory).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store, bcrypt cost) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { configureLogger, logger } from '../shared/logger/logger';

import {
  createUserModule,
  InMemUserStore,
  KyselyUserStore,
  type UserModule,
  type UserStore,
} from '../modules/users';

export type AppDeps = {
  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  now?: () => Date;
};

function buildUserStore(config: AppConfig): { store: UserStore; db: Db | null } {
  if (config.userStore === 'memory') {
    return { store: new InMemUserStore(), db: null };
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when USER_STORE=postgres');
  }

  const db = createDb(config.databaseUrl);
  return { store: new KyselyUserStore(db), db };
}

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  configureLogger({ level: config.logLevel, service: config.serviceName, env: config.nodeEnv });

  const { store, db } = buildUserStore(config);

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  logger.info('deps.ready', { userStore: config.userStore, bcryptCost: config.bcryptCost });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    store,
    passwordHasher,
    logger,
    now: overrides.now,
  });

  return {
    users,
    close: async () => {
      await db?.destroy();
    },
  };
}
