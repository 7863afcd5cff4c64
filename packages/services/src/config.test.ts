import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('requires DATABASE_URL', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    try {
      loadConfig({ DATABASE_URL: '  ' });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.problems).toEqual(['DATABASE_URL is required']);
    }
  });

  it('fills in defaults', () => {
    expect(loadConfig({ DATABASE_URL: 'sqlite::memory:' })).toEqual({
      ...DEFAULT_CONFIG,
      databaseUrl: 'sqlite::memory:'
    });
    expect(DEFAULT_CONFIG.uploadDir).toBe('./uploads');
  });

  it('reads every variable', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://app@localhost/images',
      UPLOAD_DIR: '/srv/uploads',
      PORT: '9000',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'DEBUG',
      MAX_UPLOAD_BYTES: '1024',
      ORPHAN_POLICY: 'keep',
      ALLOWED_MIME_TYPES: 'image/JPEG, image/png,,',
      DATABASE_MAX_CONNECTIONS: '25'
    });

    expect(config).toEqual({
      databaseUrl: 'postgres://app@localhost/images',
      uploadDir: '/srv/uploads',
      port: 9000,
      host: '127.0.0.1',
      logLevel: 'debug',
      maxUploadBytes: 1024,
      orphanPolicy: 'keep',
      allowedMimeTypes: ['image/jpeg', 'image/png'],
      databaseMaxConnections: 25
    });
  });

  it('reports every problem at once', () => {
    let problems: string[] = [];
    try {
      loadConfig({
        DATABASE_URL: 'mysql://localhost/images',
        PORT: '70000',
        LOG_LEVEL: 'loud',
        ORPHAN_POLICY: 'archive',
        MAX_UPLOAD_BYTES: '1.5',
        DATABASE_MAX_CONNECTIONS: '0'
      });
    } catch (err) {
      if (err instanceof ConfigError) problems = err.problems;
    }

    expect(problems).toEqual([
      'DATABASE_URL is invalid: Unsupported database scheme "mysql"',
      'LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got "loud"',
      'ORPHAN_POLICY must be one of delete, keep, got "archive"',
      'PORT must be an integer between 1 and 65535, got "70000"',
      `MAX_UPLOAD_BYTES must be an integer between 1 and ${Number.MAX_SAFE_INTEGER}, got "1.5"`,
      'DATABASE_MAX_CONNECTIONS must be an integer between 1 and 1000, got "0"'
    ]);
  });

  it('accepts any upload type unless a list is given', () => {
    expect(loadConfig({ DATABASE_URL: 'sqlite::memory:' }).allowedMimeTypes).toEqual([]);
    expect(loadConfig({ DATABASE_URL: 'sqlite::memory:', ALLOWED_MIME_TYPES: ' ' }).allowedMimeTypes).toEqual([]);
  });

  it('sizes the database pool from DATABASE_MAX_CONNECTIONS', () => {
    expect(loadConfig({ DATABASE_URL: 'sqlite::memory:' }).databaseMaxConnections).toBe(10);
    expect(
      loadConfig({ DATABASE_URL: 'postgres://app@localhost/images', DATABASE_MAX_CONNECTIONS: '3' }).databaseMaxConnections
    ).toBe(3);
  });
});
