/**
 * Schema migrations
 *
 * The schema is small enough to live in code. Each driver gets its own DDL;
 * versions and names must stay in step between the two lists.
 */

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const SQLITE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

export const PG_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

export const SQLITE_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_image_metadata',
    sql: `
      CREATE TABLE IF NOT EXISTS image_metadata (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        filename TEXT NOT NULL UNIQUE,
        original_filename TEXT NOT NULL,
        uploader_name TEXT,
        upload_timestamp TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        location TEXT
      );
    `
  }
];

export const PG_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_image_metadata',
    sql: `
      CREATE TABLE IF NOT EXISTS image_metadata (
        id SERIAL PRIMARY KEY,
        filename VARCHAR NOT NULL UNIQUE,
        original_filename VARCHAR NOT NULL,
        uploader_name VARCHAR,
        upload_timestamp TIMESTAMPTZ NOT NULL DEFAULT now(),
        location VARCHAR
      );
    `
  }
];

/**
 * Migrations from `all` whose version is not in `applied`, in order.
 */
export function pendingMigrations(all: Migration[], applied: Iterable<number>): Migration[] {
  const done = new Set(applied);
  return all
    .filter(migration => !done.has(migration.version))
    .sort((a, b) => a.version - b.version);
}
