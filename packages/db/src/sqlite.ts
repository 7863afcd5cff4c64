/**
 * SQLite driver, backed by better-sqlite3
 *
 * better-sqlite3 is synchronous, so one connection serves every request;
 * sessions are thin handles over it.
 */

import Database, { Database as DatabaseType } from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DBService, DbSession } from './connection.js';
import { toDatabaseError } from './errors.js';
import { pendingMigrations, SQLITE_MIGRATIONS, SQLITE_MIGRATIONS_TABLE } from './migrations.js';
import { SqliteImageMetadataRepository } from './models/index.js';

export class SqliteDBService implements DBService {
  readonly driver = 'sqlite' as const;

  private constructor(private db: DatabaseType) {}

  static open(filename: string): SqliteDBService {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }

    let db: DatabaseType;
    try {
      db = new Database(filename);
    } catch (err) {
      throw toDatabaseError(err, `Failed to open SQLite database at ${filename}`);
    }

    if (filename !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    return new SqliteDBService(db);
  }

  /**
   * Underlying connection, for tests and diagnostics
   */
  get database(): DatabaseType {
    return this.db;
  }

  async runMigrations(): Promise<string[]> {
    try {
      this.db.exec(SQLITE_MIGRATIONS_TABLE);

      const applied = this.db
        .prepare<[], { version: number }>('SELECT version FROM _migrations')
        .all()
        .map(row => row.version);

      const names: string[] = [];
      for (const migration of pendingMigrations(SQLITE_MIGRATIONS, applied)) {
        const apply = this.db.transaction(() => {
          this.db.exec(migration.sql);
          this.db
            .prepare<[number, string]>('INSERT INTO _migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
        });
        apply();
        names.push(migration.name);
      }
      return names;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to apply SQLite migrations');
    }
  }

  async openSession(): Promise<DbSession> {
    return {
      imageMetadata: new SqliteImageMetadataRepository(this.db),
      release: async () => {}
    };
  }

  async ping(): Promise<void> {
    try {
      this.db.prepare('SELECT 1').get();
    } catch (err) {
      throw toDatabaseError(err, 'SQLite database is not reachable');
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
