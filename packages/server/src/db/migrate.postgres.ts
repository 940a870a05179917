/**
 * PostgreSQL migration runner.
 *
 * Executes numbered SQL files from ./migrations in order and tracks them in
 * a `_ledger_migrations` table. Already-applied files are skipped.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import type { Sql } from 'postgres';
import { createLogger } from '../lib/logger.js';

const log = createLogger('Migrate');

const DEFAULT_MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

/**
 * Ordered migration files in `dir`.
 */
export function getMigrationFiles(dir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export async function runPostgresMigrations(
  sql: Sql,
  dir: string = DEFAULT_MIGRATIONS_DIR,
): Promise<MigrationResult> {
  await sql`
    CREATE TABLE IF NOT EXISTS _ledger_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
  const rows = await sql<{ name: string }[]>`SELECT name FROM _ledger_migrations ORDER BY name`;
  const applied = new Set(rows.map((r) => r.name));

  const result: MigrationResult = { applied: [], skipped: [] };
  for (const file of getMigrationFiles(dir)) {
    if (applied.has(file)) {
      result.skipped.push(file);
      continue;
    }
    const ddl = readFileSync(path.join(dir, file), 'utf-8');
    await sql.begin(async (tx) => {
      await tx.unsafe(ddl);
      await tx.unsafe('INSERT INTO _ledger_migrations (name) VALUES ($1)', [file]);
    });
    log.info(`Applied migration ${file}`);
    result.applied.push(file);
  }
  return result;
}
