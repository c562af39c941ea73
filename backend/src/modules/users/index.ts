/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal or /policies.
 *
 * RULES:
 * - Only export stable contracts needed outside the module (app wiring, tests).
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { KyselyUserStore } from './dal/kysely-user.store';
export { InMemUserStore } from './dal/inmem-user.store';
export type { UserStore } from './dal/user.store';
export type { UserRecord, UserResponse } from './user.types';
