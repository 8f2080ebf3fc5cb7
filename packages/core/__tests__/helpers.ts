import { initializeDatabase, runMigrations, type DatabaseClient } from '../src/db/client.js';

/**
 * Fresh in-memory database with the full schema applied
 */
export async function createTestDatabase(): Promise<DatabaseClient> {
  const db = await initializeDatabase({ sqliteFilePath: ':memory:' });
  await runMigrations(db);
  return db;
}
