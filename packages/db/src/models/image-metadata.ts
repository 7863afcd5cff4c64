/**
 * Image metadata model
 *
 * One row per uploaded image in `image_metadata`. Rows are created once and
 * never updated.
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import { DatabaseError, toDatabaseError } from '../errors.js';

// --- Types ---

export interface ImageMetadata {
  id: number;
  /** Generated on-disk name, unique across all records */
  filename: string;
  originalFilename: string;
  uploaderName: string | null;
  /** ISO-8601 UTC */
  uploadTimestamp: string;
  location: string | null;
}

export interface CreateImageMetadata {
  filename: string;
  originalFilename: string;
  uploaderName?: string | null;
  location?: string | null;
}

export interface Page {
  skip: number;
  limit: number;
}

export interface ImageMetadataRepository {
  create(data: CreateImageMetadata): Promise<ImageMetadata>;
  list(page: Page): Promise<ImageMetadata[]>;
  get(id: number): Promise<ImageMetadata | undefined>;
  count(): Promise<number>;
}

const COLUMNS = 'id, filename, original_filename, uploader_name, upload_timestamp, location';

/** Largest value a PostgreSQL SERIAL column holds */
const PG_MAX_ID = 2147483647;

function assertPage({ skip, limit }: Page): void {
  if (!Number.isInteger(skip) || skip < 0) {
    throw new RangeError(`skip must be a non-negative integer, got ${skip}`);
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
}

// --- SQLite ---

interface SqliteImageMetadataRow {
  id: number;
  filename: string;
  original_filename: string;
  uploader_name: string | null;
  upload_timestamp: string;
  location: string | null;
}

function rowToImageMetadata(row: SqliteImageMetadataRow): ImageMetadata {
  return {
    id: row.id,
    filename: row.filename,
    originalFilename: row.original_filename,
    uploaderName: row.uploader_name,
    uploadTimestamp: row.upload_timestamp,
    location: row.location
  };
}

type InsertParams = [string, string, string | null, string | null];

export class SqliteImageMetadataRepository implements ImageMetadataRepository {
  constructor(private db: DatabaseType) {}

  async create(data: CreateImageMetadata): Promise<ImageMetadata> {
    let row: SqliteImageMetadataRow | undefined;
    try {
      row = this.db.prepare<InsertParams, SqliteImageMetadataRow>(`
        INSERT INTO image_metadata (filename, original_filename, uploader_name, location)
        VALUES (?, ?, ?, ?)
        RETURNING ${COLUMNS}
      `).get(data.filename, data.originalFilename, data.uploaderName ?? null, data.location ?? null);
    } catch (err) {
      throw toDatabaseError(err, 'Failed to insert image metadata');
    }

    if (!row) {
      throw new DatabaseError('Insert into image_metadata returned no row');
    }
    return rowToImageMetadata(row);
  }

  async list(page: Page): Promise<ImageMetadata[]> {
    assertPage(page);
    try {
      const rows = this.db.prepare<[number, number], SqliteImageMetadataRow>(`
        SELECT ${COLUMNS}
        FROM image_metadata
        ORDER BY id
        LIMIT ? OFFSET ?
      `).all(page.limit, page.skip);
      return rows.map(rowToImageMetadata);
    } catch (err) {
      throw toDatabaseError(err, 'Failed to list image metadata');
    }
  }

  async get(id: number): Promise<ImageMetadata | undefined> {
    try {
      const row = this.db.prepare<[number], SqliteImageMetadataRow>(`
        SELECT ${COLUMNS}
        FROM image_metadata
        WHERE id = ?
      `).get(id);
      return row ? rowToImageMetadata(row) : undefined;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to read image metadata');
    }
  }

  async count(): Promise<number> {
    try {
      const row = this.db.prepare<[], { count: number }>(
        'SELECT COUNT(*) AS count FROM image_metadata'
      ).get();
      return row?.count ?? 0;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to count image metadata');
    }
  }
}

// --- PostgreSQL ---

/**
 * Runs one statement on a checked-out client and returns its rows.
 */
export type PgQuery = (text: string, values?: unknown[]) => Promise<Record<string, unknown>[]>;

function nullableString(value: unknown): string | null | undefined {
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

function pgRowToImageMetadata(row: Record<string, unknown>): ImageMetadata {
  const id = row['id'];
  const filename = row['filename'];
  const originalFilename = row['original_filename'];
  const uploaderName = nullableString(row['uploader_name']);
  const location = nullableString(row['location']);
  const timestamp = row['upload_timestamp'];

  if (
    typeof id !== 'number' ||
    typeof filename !== 'string' ||
    typeof originalFilename !== 'string' ||
    uploaderName === undefined ||
    location === undefined ||
    !(timestamp instanceof Date || typeof timestamp === 'string')
  ) {
    throw new DatabaseError('Unexpected row shape in image_metadata');
  }

  return {
    id,
    filename,
    originalFilename,
    uploaderName,
    uploadTimestamp: new Date(timestamp).toISOString(),
    location
  };
}

export class PgImageMetadataRepository implements ImageMetadataRepository {
  constructor(private query: PgQuery) {}

  async create(data: CreateImageMetadata): Promise<ImageMetadata> {
    let rows: Record<string, unknown>[];
    try {
      rows = await this.query(
        `INSERT INTO image_metadata (filename, original_filename, uploader_name, location)
         VALUES ($1, $2, $3, $4)
         RETURNING ${COLUMNS}`,
        [data.filename, data.originalFilename, data.uploaderName ?? null, data.location ?? null]
      );
    } catch (err) {
      throw toDatabaseError(err, 'Failed to insert image metadata');
    }

    const [row] = rows;
    if (!row) {
      throw new DatabaseError('Insert into image_metadata returned no row');
    }
    return pgRowToImageMetadata(row);
  }

  async list(page: Page): Promise<ImageMetadata[]> {
    assertPage(page);
    let rows: Record<string, unknown>[];
    try {
      rows = await this.query(
        `SELECT ${COLUMNS} FROM image_metadata ORDER BY id LIMIT $1 OFFSET $2`,
        [page.limit, page.skip]
      );
    } catch (err) {
      throw toDatabaseError(err, 'Failed to list image metadata');
    }
    return rows.map(pgRowToImageMetadata);
  }

  async get(id: number): Promise<ImageMetadata | undefined> {
    // Out-of-range ids cannot exist, and pg would reject them as int4
    if (!Number.isInteger(id) || id < 1 || id > PG_MAX_ID) {
      return undefined;
    }

    let rows: Record<string, unknown>[];
    try {
      rows = await this.query(`SELECT ${COLUMNS} FROM image_metadata WHERE id = $1`, [id]);
    } catch (err) {
      throw toDatabaseError(err, 'Failed to read image metadata');
    }
    const [row] = rows;
    return row ? pgRowToImageMetadata(row) : undefined;
  }

  async count(): Promise<number> {
    let rows: Record<string, unknown>[];
    try {
      rows = await this.query('SELECT COUNT(*)::int AS count FROM image_metadata');
    } catch (err) {
      throw toDatabaseError(err, 'Failed to count image metadata');
    }
    const count = rows[0]?.['count'];
    return typeof count === 'number' ? count : 0;
  }
}
