/**
 * PostgreSQL driver, backed by a pg connection pool
 *
 * Every session checks out its own client and hands it back on release.
 */

import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import type { DBService, DbSession } from './connection.js';
import { toDatabaseError } from './errors.js';
import { PG_MIGRATIONS, PG_MIGRATIONS_TABLE, pendingMigrations } from './migrations.js';
import { PgImageMetadataRepository, type PgQuery } from './models/index.js';

const DEFAULT_MAX_CONNECTIONS = 10;

function queryWith(client: PoolClient): PgQuery {
  return async (text, values = []) => {
    const result = await client.query<Record<string, unknown>>(text, values);
    return result.rows;
  };
}

export class PostgresDBService implements DBService {
  readonly driver = 'postgres' as const;

  private constructor(private pool: Pool) {}

  static open(connectionString: string, maxConnections = DEFAULT_MAX_CONNECTIONS): PostgresDBService {
    return new PostgresDBService(new pg.Pool({ connectionString, max: maxConnections }));
  }

  async runMigrations(): Promise<string[]> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw toDatabaseError(err, 'Failed to connect to PostgreSQL');
    }

    try {
      await client.query(PG_MIGRATIONS_TABLE);
      const applied = await client.query<{ version: number }>('SELECT version FROM _migrations');

      const names: string[] = [];
      for (const migration of pendingMigrations(PG_MIGRATIONS, applied.rows.map(row => row.version))) {
        await client.query('BEGIN');
        try {
          await client.query(migration.sql);
          await client.query('INSERT INTO _migrations (version, name) VALUES ($1, $2)', [
            migration.version,
            migration.name
          ]);
          await client.query('COMMIT');
        } catch (err) {
          await client.query('ROLLBACK');
          throw err;
        }
        names.push(migration.name);
      }
      return names;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to apply PostgreSQL migrations');
    } finally {
      client.release();
    }
  }

  async openSession(): Promise<DbSession> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw toDatabaseError(err, 'Failed to connect to PostgreSQL');
    }

    let released = false;
    return {
      imageMetadata: new PgImageMetadataRepository(queryWith(client)),
      release: async () => {
        if (!released) {
          released = true;
          client.release();
        }
      }
    };
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query('SELECT 1');
    } catch (err) {
      throw toDatabaseError(err, 'PostgreSQL is not reachable');
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
