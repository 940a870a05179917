/**
 * PostgreSQL connection via postgres.js + Drizzle ORM.
 */

import postgres, { type Sql } from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { getErrorMessage } from '@creditledger/core';
import * as schema from './schema.postgres.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('Postgres');

export type PostgresDb = PostgresJsDatabase<typeof schema>;

export interface CreatePostgresDbOptions {
  databaseUrl: string;
  /** Pool size (default 10) */
  max?: number;
}

export interface PostgresConnection {
  /** Drizzle ORM instance */
  db: PostgresDb;
  /** Raw postgres.js client, needed for migrations and graceful shutdown (sql.end()) */
  sql: Sql;
}

/**
 * Create a Drizzle PostgreSQL instance backed by postgres.js.
 *
 * Returns both the Drizzle wrapper and the raw sql client so callers
 * can drain the pool on shutdown.
 */
export function createPostgresConnection(options: CreatePostgresDbOptions): PostgresConnection {
  const url = options.databaseUrl;
  const ssl = url.includes('sslmode=require') ? ('require' as const) : undefined;

  const client = postgres(url, {
    max: options.max ?? 10,
    idle_timeout: 30,
    connect_timeout: 10,
    max_lifetime: 1800,
    connection: {
      application_name: 'creditledger',
    },
    ...(ssl ? { ssl } : {}),
    onnotice: (notice) => {
      log.debug(`PG notice: ${notice.message}`);
    },
  });

  const db = drizzle(client, { schema });
  return { db, sql: client };
}

/**
 * Verify Postgres connectivity. Throws with a clear message if unreachable.
 * Called at startup to fail fast.
 */
export async function verifyPostgresConnection(sql: Sql): Promise<void> {
  try {
    await sql`SELECT 1`;
    log.info('PostgreSQL connection verified');
  } catch (err) {
    throw new Error(`PostgreSQL unreachable at startup: ${getErrorMessage(err)}`);
  }
}
