/**
 * SQLite Database Adapter
 *
 * Synchronous better-sqlite3 behind the async DatabaseAdapter interface.
 * File databases run in WAL mode; `:memory:` is used by tests.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { DatabaseAdapter } from '../database.js';
import { MIGRATIONS, type Migration } from '../migrations.js';

const VersionRowSchema = z.object({ version: z.number().nullable() });

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;

  constructor(filepath: string = ':memory:') {
    if (filepath !== ':memory:') {
      mkdirSync(dirname(filepath), { recursive: true });
    }
    this.db = new Database(filepath);

    if (filepath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
  }

  async queryOne(sql: string, params: ReadonlyArray<unknown> = []): Promise<unknown> {
    return this.db.prepare(sql).get(...params) ?? null;
  }

  async queryMany(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<unknown>> {
    return this.db.prepare(sql).all(...params);
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    return this.db.prepare(sql).run(...params).changes;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn();
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // ==========================================================================
  // Migration Management
  // ==========================================================================

  /**
   * Run all pending migrations
   *
   * @returns Versions applied by this call
   */
  async runMigrations(migrations: readonly Migration[] = MIGRATIONS): Promise<number[]> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = await this.getDatabaseVersion();
    const pending = [...migrations]
      .filter((migration) => migration.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    const apply = this.db.transaction(() => {
      for (const migration of pending) {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      }
    });
    apply();

    return pending.map((migration) => migration.version);
  }

  /**
   * Current schema version (0 before any migration)
   */
  async getDatabaseVersion(): Promise<number> {
    const row = VersionRowSchema.parse(
      this.db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get()
    );
    return row.version ?? 0;
  }
}

/**
 * Open a database and bring its schema up to date
 */
export async function openDatabase(filepath: string = ':memory:'): Promise<SQLiteAdapter> {
  const adapter = new SQLiteAdapter(filepath);
  await adapter.runMigrations();
  return adapter;
}
