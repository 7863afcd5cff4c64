/**
 * Database connection management
 *
 * `DATABASE_URL` selects the driver:
 * - `sqlite:<path>`, `sqlite:///<relative>`, `sqlite:////<absolute>`, `sqlite::memory:`
 * - `postgres://…` or `postgresql://…` (a `+driver` suffix is ignored)
 */

import type { ImageMetadataRepository } from './models/index.js';
import { DatabaseError } from './errors.js';
import { PostgresDBService } from './postgres.js';
import { SqliteDBService } from './sqlite.js';

export type DbDriver = 'sqlite' | 'postgres';

export type DatabaseTarget =
  | { driver: 'sqlite'; filename: string }
  | { driver: 'postgres'; connectionString: string };

export interface DbConfig {
  url: string;
  /** Upper bound on pooled connections (PostgreSQL only) */
  maxConnections?: number;
}

/**
 * A unit of database work scoped to one request.
 */
export interface DbSession {
  readonly imageMetadata: ImageMetadataRepository;
  release(): Promise<void>;
}

export interface DBService {
  readonly driver: DbDriver;
  /** Create any missing tables. Returns the names of the migrations applied. */
  runMigrations(): Promise<string[]>;
  openSession(): Promise<DbSession>;
  /** Round-trip to the database; rejects when it is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

const MEMORY = ':memory:';

export function parseDatabaseUrl(url: string): DatabaseTarget {
  const trimmed = url.trim();
  const schemeEnd = trimmed.indexOf(':');
  if (schemeEnd <= 0) {
    throw new DatabaseError(`Database URL has no scheme: "${url}"`);
  }

  // postgresql+psycopg2:// and friends
  const scheme = trimmed.slice(0, schemeEnd).split('+')[0]?.toLowerCase();
  const rest = trimmed.slice(schemeEnd + 1);

  if (scheme === 'sqlite') {
    if (rest === '' || rest === '//' || rest === MEMORY || rest === `///${MEMORY}`) {
      return { driver: 'sqlite', filename: MEMORY };
    }
    if (rest.startsWith('///')) {
      // sqlite:///relative.db and sqlite:////absolute.db
      return { driver: 'sqlite', filename: rest.slice(3) };
    }
    if (rest.startsWith('//')) {
      return { driver: 'sqlite', filename: rest.slice(2) };
    }
    return { driver: 'sqlite', filename: rest };
  }

  if (scheme === 'postgres' || scheme === 'postgresql') {
    return { driver: 'postgres', connectionString: `postgresql:${rest}` };
  }

  throw new DatabaseError(`Unsupported database scheme "${scheme ?? ''}"`);
}

/**
 * Open a connection (or pool) for `config.url`.
 */
export async function connect(config: DbConfig): Promise<DBService> {
  const target = parseDatabaseUrl(config.url);

  if (target.driver === 'sqlite') {
    return SqliteDBService.open(target.filename);
  }
  return PostgresDBService.open(target.connectionString, config.maxConnections);
}

/**
 * Run `fn` inside a fresh session and release it however `fn` settles.
 */
export async function withSession<T>(
  db: DBService,
  fn: (session: DbSession) => Promise<T>
): Promise<T> {
  const session = await db.openSession();
  try {
    return await fn(session);
  } finally {
    await session.release();
  }
}
