/**
 * Database Client Setup
 *
 * Initializes Drizzle ORM over better-sqlite3. Handles file permissions,
 * pragmas, migrations and shutdown.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import * as schema from '../schema/index.js';
import { logger } from '../utils/logger.js';

export type DatabaseClient = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  /** File path, or ':memory:' for an ephemeral database */
  sqliteFilePath?: string;
  /** Write-Ahead Logging (ignored for in-memory databases) */
  enableWAL?: boolean;
}

/** Underlying better-sqlite3 handle for each Drizzle client */
const rawHandles = new WeakMap<DatabaseClient, Database.Database>();

/**
 * Initialize database connection
 *
 * @param config Database configuration
 * @returns Drizzle database client
 */
export async function initializeDatabase(config: DatabaseConfig = {}): Promise<DatabaseClient> {
  const filePath = config.sqliteFilePath || './data/pierre.db';
  const inMemory = filePath === ':memory:';

  if (!inMemory) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 }); // drwx------ (owner only)
    }
  }

  const sqlite = new Database(filePath);

  if (!inMemory) {
    try {
      fs.chmodSync(filePath, 0o600);
    } catch (err) {
      logger.warn({ err, filePath }, '[db] Could not set file permissions');
    }

    if (config.enableWAL !== false) {
      sqlite.pragma('journal_mode = WAL');
      sqlite.pragma('synchronous = NORMAL');
    }
  }

  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('temp_store = MEMORY');

  const db = drizzle(sqlite, { schema });
  rawHandles.set(db, sqlite);

  logger.info({ filePath }, '[db] SQLite initialized');

  return db;
}

function rawHandle(db: DatabaseClient): Database.Database {
  const handle = rawHandles.get(db);
  if (!handle) {
    throw new Error('[db] Database client was not created by initializeDatabase');
  }
  return handle;
}

/**
 * Run database migrations
 *
 * Applies every .sql file in packages/core/drizzle/ in lexicographic order.
 * The DDL is idempotent (IF NOT EXISTS), so re-running is safe.
 *
 * @param db Database client
 */
export async function runMigrations(db: DatabaseClient): Promise<void> {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  const migrationsDir = path.join(currentDir, '../../drizzle');

  if (!fs.existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, '[db] Migrations directory not found');
    return;
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f: string) => f.endsWith('.sql'))
    .sort();

  const sqlite = rawHandle(db);
  for (const file of files) {
    const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    try {
      sqlite.exec(sqlContent);
      logger.debug({ file }, '[db] Migration applied');
    } catch (err) {
      logger.error({ err, file }, '[db] Migration failed');
      throw err;
    }
  }

  logger.info({ count: files.length }, '[db] All migrations complete');
}

/**
 * Close database connection
 *
 * @param db Database client
 */
export async function closeDatabase(db: DatabaseClient): Promise<void> {
  const sqlite = rawHandles.get(db);
  if (!sqlite) {
    return;
  }
  sqlite.close();
  rawHandles.delete(db);
  logger.info('[db] SQLite connection closed');
}

/**
 * Health check - verify database connectivity
 *
 * @param db Database client
 * @returns true if healthy, false otherwise
 */
export async function checkDatabaseHealth(db: DatabaseClient): Promise<boolean> {
  try {
    rawHandle(db).prepare('SELECT 1').get();
    return true;
  } catch (err) {
    logger.error({ err }, '[db] Health check failed');
    return false;
  }
}
