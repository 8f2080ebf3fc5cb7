import { TokenVault, initializeDatabase, runMigrations, type DatabaseClient } from '@pierre/core';

export async function createTestDatabase(): Promise<DatabaseClient> {
  const db = await initializeDatabase({ sqliteFilePath: ':memory:' });
  await runMigrations(db);
  return db;
}

export function createTestVault(fill = 7): TokenVault {
  return new TokenVault(Buffer.alloc(32, fill));
}

/**
 * Settable clock shared by the key set and the token service
 */
export class TestClock {
  private current: Date;

  constructor(start = '2026-01-01T00:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now = (): Date => this.current;

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }

  get unixSeconds(): number {
    return Math.floor(this.current.getTime() / 1000);
  }
}
