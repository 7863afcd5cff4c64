/**
 * @photodrop/db
 *
 * Metadata store for photodrop.
 *
 * This package provides:
 * - SQLite (better-sqlite3) and PostgreSQL (pg) connections
 * - Schema creation on startup
 * - The image metadata repository
 */

export * from './models/index.js';
export * from './connection.js';
export * from './errors.js';
export { SqliteDBService } from './sqlite.js';
export { PostgresDBService } from './postgres.js';
