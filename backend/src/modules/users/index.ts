/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal or /policies.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { UserService } from './user.service';
export { KyselyUserStore } from './dal/kysely-user.store';
export { InMemUserStore } from './dal/inmem-user.store';
export type { UserStore, UserStoreTx } from './user.store';
export type { User, UserRole, UserConflictField } from './user.types';
