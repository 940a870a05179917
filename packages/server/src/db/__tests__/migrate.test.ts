import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql } from 'drizzle-orm';
import { createTestDb, type SqliteDb } from '../index.js';
import { runMigrations } from '../migrate.sqlite.js';

describe('runMigrations (SQLite)', () => {
  let db: SqliteDb;

  beforeEach(() => {
    db = createTestDb();
    runMigrations(db);
  });

  afterEach(() => {
    db.$client.close();
  });

  it('creates the ledger tables', () => {
    const tables = db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    );
    expect(tables.map((t) => t.name)).toEqual(['report_purchases', 'subscriptions', 'users']);
  });

  it('is idempotent', () => {
    expect(() => runMigrations(db)).not.toThrow();
  });

  // Raw driver statements: drizzle wraps driver errors in its own query message
  it('enforces one purchase per payment ref', () => {
    const insert = `INSERT INTO report_purchases (user_id, provider_payment_ref, amount, created_at)
      VALUES ('user_1', 'pi_1', 299, '2026-03-10T12:00:00.000Z')`;
    db.$client.exec(insert);
    expect(() => db.$client.exec(insert)).toThrow(/UNIQUE constraint failed: report_purchases\.provider_payment_ref/);
  });

  it('rejects a negative period usage', () => {
    expect(() =>
      db.$client.exec(`INSERT INTO subscriptions (user_id, period_usage, created_at, updated_at)
        VALUES ('user_1', -1, '2026-03-10T12:00:00.000Z', '2026-03-10T12:00:00.000Z')`),
    ).toThrow(/CHECK constraint failed/);
  });
});
