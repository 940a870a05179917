/**
 * Database initialization (SQLite).
 *
 * WAL mode with tuned pragmas. `busy_timeout` bounds how long a writer waits
 * for another connection's write lock.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.sqlite.js';

export type SqliteDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export interface CreateDbOptions {
  /** SQLite file path (default: './creditledger.db'). Use ':memory:' for tests. */
  databasePath?: string;
  /** Busy wait bound in ms (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * Create a SQLite database connection.
 *
 * Pragmas:
 * - journal_mode=WAL (concurrent read/write)
 * - synchronous=NORMAL (durability/performance balance)
 * - busy_timeout (lock wait bound)
 */
export function createDb(options: CreateDbOptions = {}): SqliteDb {
  const sqlite = new Database(options.databasePath ?? './creditledger.db');

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma(`busy_timeout = ${Math.max(0, Math.floor(options.busyTimeoutMs ?? 5000))}`);
  sqlite.pragma('foreign_keys = ON');

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory SQLite database for testing.
 * Tables are created by runMigrations().
 */
export function createTestDb(): SqliteDb {
  return createDb({ databasePath: ':memory:' });
}
