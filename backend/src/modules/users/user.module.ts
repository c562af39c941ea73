/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: store -> service -> controller -> routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';

import type { UserStore } from './dal/user.store';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  store: UserStore;
  passwordHasher: PasswordHasher;
  logger: Logger;
  now?: () => Date;
}) {
  const userService = new UserService({
    store: deps.store,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    now: deps.now,
  });

  const controller = new UserController(userService);

  return {
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
