import { describe, expect, it, vi } from 'vitest';
import { connect, parseDatabaseUrl, withSession, type DBService, type DbSession } from './connection.js';
import { DatabaseError } from './errors.js';
import { SqliteDBService } from './sqlite.js';

describe('parseDatabaseUrl', () => {
  it('reads in-memory SQLite URLs', () => {
    expect(parseDatabaseUrl('sqlite::memory:')).toEqual({ driver: 'sqlite', filename: ':memory:' });
    expect(parseDatabaseUrl('sqlite://')).toEqual({ driver: 'sqlite', filename: ':memory:' });
  });

  it('reads relative and absolute SQLite paths', () => {
    expect(parseDatabaseUrl('sqlite:data/images.db')).toEqual({ driver: 'sqlite', filename: 'data/images.db' });
    expect(parseDatabaseUrl('sqlite:///images.db')).toEqual({ driver: 'sqlite', filename: 'images.db' });
    expect(parseDatabaseUrl('sqlite:////var/lib/images.db')).toEqual({
      driver: 'sqlite',
      filename: '/var/lib/images.db'
    });
  });

  it('normalizes PostgreSQL URLs', () => {
    expect(parseDatabaseUrl('postgres://app:pw@db:5432/images')).toEqual({
      driver: 'postgres',
      connectionString: 'postgresql://app:pw@db:5432/images'
    });
    expect(parseDatabaseUrl('postgresql+psycopg2://app@localhost/images')).toEqual({
      driver: 'postgres',
      connectionString: 'postgresql://app@localhost/images'
    });
  });

  it('rejects unknown schemes', () => {
    expect(() => parseDatabaseUrl('mysql://localhost/images')).toThrow(DatabaseError);
    expect(() => parseDatabaseUrl('images.db')).toThrow('Database URL has no scheme');
  });
});

describe('SqliteDBService', () => {
  it('creates the schema once', async () => {
    const db = await connect({ url: 'sqlite::memory:' });
    try {
      expect(db.driver).toBe('sqlite');
      expect(await db.runMigrations()).toEqual(['create_image_metadata']);
      expect(await db.runMigrations()).toEqual([]);
      await expect(db.ping()).resolves.toBeUndefined();
    } finally {
      await db.close();
    }
  });

  it('answers ping failures with a DatabaseError after close', async () => {
    const db = SqliteDBService.open(':memory:');
    await db.close();
    await expect(db.ping()).rejects.toBeInstanceOf(DatabaseError);
  });
});

describe('withSession', () => {
  function fakeDb(release: () => Promise<void>): DBService {
    const session: DbSession = {
      imageMetadata: {
        create: vi.fn(),
        list: vi.fn(),
        get: vi.fn(),
        count: vi.fn()
      },
      release
    };
    return {
      driver: 'sqlite',
      runMigrations: async () => [],
      openSession: async () => session,
      ping: async () => {},
      close: async () => {}
    };
  }

  it('releases the session after success', async () => {
    const release = vi.fn(async () => {});
    const result = await withSession(fakeDb(release), async () => 42);
    expect(result).toBe(42);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('releases the session when the work fails', async () => {
    const release = vi.fn(async () => {});
    await expect(
      withSession(fakeDb(release), async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(release).toHaveBeenCalledTimes(1);
  });
});
