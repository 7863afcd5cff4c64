/**
 * Image service
 *
 * Upload orchestration: the file goes to storage first, then the metadata
 * row is inserted in its own session. When the session or the insert fails
 * the saved file is an orphan and the configured policy decides whether it
 * is deleted or kept.
 */

import type { Readable } from 'node:stream';
import { withSession, type DBService, type ImageMetadata, type Page } from '@photodrop/db';
import { noopLogger, type Logger } from './logger.js';
import type { StorageService } from './storage.js';

export type OrphanPolicy = 'delete' | 'keep';

export interface ImageServiceOptions {
  orphanPolicy: OrphanPolicy;
  logger?: Logger;
}

export interface RecordUpload {
  /** Name returned by `saveFile` */
  filename: string;
  originalFilename: string;
  uploaderName?: string | null;
  location?: string | null;
}

export class ImageService {
  private logger: Logger;

  constructor(
    private storage: StorageService,
    private db: DBService,
    private options: ImageServiceOptions
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  get orphanPolicy(): OrphanPolicy {
    return this.options.orphanPolicy;
  }

  /**
   * Store the upload and return its generated name.
   */
  async saveFile(stream: Readable, originalFilename: string): Promise<string> {
    const filename = await this.storage.save(stream, originalFilename);
    this.logger.info({ filename, originalFilename }, 'Image file saved');
    return filename;
  }

  /**
   * Insert the metadata row for a saved file. If no row gets written, the
   * orphan policy is applied before the error is rethrown.
   */
  async recordUpload(data: RecordUpload): Promise<ImageMetadata> {
    try {
      const record = await withSession(this.db, session => session.imageMetadata.create(data));
      this.logger.info({ id: record.id, filename: record.filename }, 'Image metadata created');
      return record;
    } catch (err) {
      await this.handleOrphan(data.filename, err);
      throw err;
    }
  }

  /**
   * Remove a saved file that will never get a record, regardless of policy.
   * A failed removal is logged, never thrown, so the caller's own error wins.
   */
  async discard(filename: string): Promise<void> {
    try {
      await this.storage.remove(filename);
      this.logger.info({ filename }, 'Discarded rejected upload');
    } catch (err) {
      this.logger.error({ filename, err }, 'Failed to discard rejected upload');
    }
  }

  list(page: Page): Promise<ImageMetadata[]> {
    return withSession(this.db, session => session.imageMetadata.list(page));
  }

  get(id: number): Promise<ImageMetadata | undefined> {
    return withSession(this.db, session => session.imageMetadata.get(id));
  }

  private async handleOrphan(filename: string, reason: unknown): Promise<void> {
    if (this.options.orphanPolicy === 'keep') {
      this.logger.warn({ filename, err: reason }, 'Metadata insert failed, keeping orphaned file');
      return;
    }

    try {
      await this.storage.remove(filename);
      this.logger.warn({ filename, err: reason }, 'Metadata insert failed, orphaned file removed');
    } catch (removeErr) {
      this.logger.error({ filename, err: removeErr }, 'Failed to remove orphaned file');
    }
  }
}
