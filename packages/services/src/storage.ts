/**
 * Storage layout manager
 *
 * Owns the storage root: uploads are written there under generated names and
 * read back by name. Client-supplied names never reach the filesystem
 * unchecked.
 */

import * as crypto from 'node:crypto';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { StorageError } from './errors.js';

const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,16}$/;
const SAFE_FILENAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml'
};

/**
 * Extension of `originalName` including the dot, or '' when it has none or
 * it is not a plain alphanumeric extension.
 */
export function safeExtension(originalName: string): string {
  // Browsers on Windows may send full paths
  const base = originalName.split(/[\\/]/).pop() ?? '';
  const ext = path.extname(base);
  return SAFE_EXTENSION.test(ext) ? ext : '';
}

export class StorageService {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Create the storage root if it does not exist. Safe to call repeatedly.
   */
  async ensureReady(): Promise<void> {
    try {
      await fsp.mkdir(this.root, { recursive: true });
    } catch (err) {
      throw new StorageError(`Cannot create storage root ${this.root}`, { cause: err });
    }
  }

  /**
   * Write `stream` to a new file named `<uuid><ext>` and return that name.
   * A failed write leaves nothing behind.
   */
  async save(stream: Readable, originalName: string): Promise<string> {
    const filename = `${crypto.randomUUID()}${safeExtension(originalName)}`;
    const filePath = path.join(this.root, filename);

    try {
      const handle = await fsp.open(filePath, 'wx');
      await pipeline(stream, handle.createWriteStream());
    } catch (err) {
      await fsp.rm(filePath, { force: true });
      throw new StorageError(`Failed to write ${filename}`, { cause: err });
    }

    return filename;
  }

  /**
   * Delete a stored file. A file that is already gone is not an error.
   */
  async remove(filename: string): Promise<void> {
    const filePath = this.resolve(filename);
    if (!filePath) {
      throw new StorageError(`Refusing to remove unsafe name "${filename}"`);
    }
    try {
      await fsp.rm(filePath, { force: true });
    } catch (err) {
      throw new StorageError(`Failed to remove ${filename}`, { cause: err });
    }
  }

  /**
   * Absolute path for a stored file name, or undefined when the name could
   * point outside the root.
   */
  resolve(filename: string): string | undefined {
    if (!SAFE_FILENAME.test(filename) || filename.includes('..')) {
      return undefined;
    }
    const filePath = path.join(this.root, filename);
    return path.dirname(filePath) === this.root ? filePath : undefined;
  }

  contentTypeFor(filename: string): string {
    return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
  }
}
