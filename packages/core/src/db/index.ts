/**
 * Database Access Layer - Barrel Export
 *
 * Usage:
 * ```typescript
 * import { initializeDatabase, runMigrations, createUser } from '@pierre/core';
 *
 * const db = await initializeDatabase({ sqliteFilePath: ':memory:' });
 * await runMigrations(db);
 * const user = await createUser(db, { email: 'a@example.com', password: 'correct-horse' });
 * ```
 */

export {
  initializeDatabase,
  runMigrations,
  closeDatabase,
  checkDatabaseHealth,
  type DatabaseClient,
  type DatabaseConfig,
} from './client.js';

export * from './repositories/users.js';
export * from './repositories/tenants.js';
export * from './repositories/oauth-states.js';
export * from './repositories/oauth-clients.js';
export * from './repositories/oauth-tokens.js';
export * from './repositories/tenant-credentials.js';
export * from './repositories/admin-tokens.js';
export * from './repositories/settings.js';
export * from './repositories/tool-overrides.js';
export * from './repositories/audit-log.js';
export * from './repositories/signing-keys.js';
