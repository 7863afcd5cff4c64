/**
 * Configuration
 *
 * Everything comes from the environment. The entry point loads `.env`
 * first, so values there behave like exported variables.
 */

import { parseDatabaseUrl } from '@photodrop/db';
import { ConfigError } from './errors.js';
import type { OrphanPolicy } from './image.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ORPHAN_POLICIES: readonly OrphanPolicy[] = ['delete', 'keep'];

export interface AppConfig {
  databaseUrl: string;
  uploadDir: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  maxUploadBytes: number;
  orphanPolicy: OrphanPolicy;
  /** Upload content types to accept; empty accepts any */
  allowedMimeTypes: string[];
  /** Pool size for PostgreSQL */
  databaseMaxConnections: number;
}

export const DEFAULT_CONFIG: Omit<AppConfig, 'databaseUrl'> = {
  uploadDir: './uploads',
  port: 8000,
  host: '0.0.0.0',
  logLevel: 'info',
  maxUploadBytes: 20 * 1024 * 1024,
  orphanPolicy: 'delete',
  allowedMimeTypes: [],
  databaseMaxConnections: 10
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isOrphanPolicy(value: string): value is OrphanPolicy {
  return ORPHAN_POLICIES.some(policy => policy === value);
}

function readInteger(raw: string | undefined, name: string, min: number, max: number, problems: string[]): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    problems.push(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
    return undefined;
  }
  return value;
}

function readString(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function readList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map(item => item.trim().toLowerCase())
    .filter(item => item !== '');
}

/**
 * Build the configuration from `env`, reporting every problem at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  const databaseUrl = readString(env['DATABASE_URL']);
  if (!databaseUrl) {
    problems.push('DATABASE_URL is required');
  } else {
    try {
      parseDatabaseUrl(databaseUrl);
    } catch (err) {
      problems.push(`DATABASE_URL is invalid: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const logLevel = readString(env['LOG_LEVEL'])?.toLowerCase() ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  const orphanPolicy = readString(env['ORPHAN_POLICY'])?.toLowerCase() ?? DEFAULT_CONFIG.orphanPolicy;
  if (!isOrphanPolicy(orphanPolicy)) {
    problems.push(`ORPHAN_POLICY must be one of ${ORPHAN_POLICIES.join(', ')}, got "${orphanPolicy}"`);
  }

  const port = readInteger(env['PORT'], 'PORT', 1, 65535, problems);
  const maxUploadBytes = readInteger(env['MAX_UPLOAD_BYTES'], 'MAX_UPLOAD_BYTES', 1, Number.MAX_SAFE_INTEGER, problems);
  const databaseMaxConnections = readInteger(env['DATABASE_MAX_CONNECTIONS'], 'DATABASE_MAX_CONNECTIONS', 1, 1000, problems);

  if (problems.length > 0 || !databaseUrl || !isLogLevel(logLevel) || !isOrphanPolicy(orphanPolicy)) {
    throw new ConfigError(problems);
  }

  return {
    databaseUrl,
    uploadDir: readString(env['UPLOAD_DIR']) ?? DEFAULT_CONFIG.uploadDir,
    port: port ?? DEFAULT_CONFIG.port,
    host: readString(env['HOST']) ?? DEFAULT_CONFIG.host,
    logLevel,
    maxUploadBytes: maxUploadBytes ?? DEFAULT_CONFIG.maxUploadBytes,
    orphanPolicy,
    allowedMimeTypes: readList(env['ALLOWED_MIME_TYPES']) ?? DEFAULT_CONFIG.allowedMimeTypes,
    databaseMaxConnections: databaseMaxConnections ?? DEFAULT_CONFIG.databaseMaxConnections
  };
}
