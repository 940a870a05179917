/**
 * User directory: read side of the auth service's users.
 *
 * The ledger never registers users; the `users` table is a mirror kept in
 * sync by the auth service (or seeded by `upsert` in tests and local runs).
 */

import { eq, sql } from 'drizzle-orm';
import type { UserIdentity } from '@creditledger/core';
import type { SqliteDb } from './index.js';
import type { PostgresDb } from './connection.postgres.js';
import { users as sqliteUsers } from './schema.sqlite.js';
import { users as pgUsers } from './schema.postgres.js';

export interface UserDirectory {
  findById(id: string): Promise<UserIdentity | null>;
  /** Case-insensitive */
  findByEmail(email: string): Promise<UserIdentity | null>;
}

export class SqliteUserDirectory implements UserDirectory {
  constructor(private db: SqliteDb) {}

  async findById(id: string): Promise<UserIdentity | null> {
    const row = this.db
      .select({ id: sqliteUsers.id, email: sqliteUsers.email })
      .from(sqliteUsers)
      .where(eq(sqliteUsers.id, id))
      .get();
    return row ?? null;
  }

  async findByEmail(email: string): Promise<UserIdentity | null> {
    const row = this.db
      .select({ id: sqliteUsers.id, email: sqliteUsers.email })
      .from(sqliteUsers)
      .where(sql`lower(${sqliteUsers.email}) = lower(${email})`)
      .get();
    return row ?? null;
  }

  async upsert(user: UserIdentity): Promise<void> {
    this.db
      .insert(sqliteUsers)
      .values({ ...user, createdAt: new Date().toISOString() })
      .onConflictDoUpdate({ target: sqliteUsers.id, set: { email: user.email } })
      .run();
  }
}

export class PostgresUserDirectory implements UserDirectory {
  constructor(private db: PostgresDb) {}

  async findById(id: string): Promise<UserIdentity | null> {
    const [row] = await this.db
      .select({ id: pgUsers.id, email: pgUsers.email })
      .from(pgUsers)
      .where(eq(pgUsers.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByEmail(email: string): Promise<UserIdentity | null> {
    const [row] = await this.db
      .select({ id: pgUsers.id, email: pgUsers.email })
      .from(pgUsers)
      .where(sql`lower(${pgUsers.email}) = lower(${email})`)
      .limit(1);
    return row ?? null;
  }

  async upsert(user: UserIdentity): Promise<void> {
    await this.db
      .insert(pgUsers)
      .values(user)
      .onConflictDoUpdate({ target: pgUsers.id, set: { email: user.email } });
  }
}
