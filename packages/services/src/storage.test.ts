import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from './errors.js';
import { safeExtension, StorageService } from './storage.js';

const UUID_NAME = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}/;

describe('safeExtension', () => {
  it('keeps plain extensions', () => {
    expect(safeExtension('cat.jpg')).toBe('.jpg');
    expect(safeExtension('archive.tar.gz')).toBe('.gz');
    expect(safeExtension('C:\\Users\\ana\\Pictures\\beach.PNG')).toBe('.PNG');
  });

  it('drops missing or unusual extensions', () => {
    expect(safeExtension('README')).toBe('');
    expect(safeExtension('.bashrc')).toBe('');
    expect(safeExtension('../../etc/passwd')).toBe('');
    expect(safeExtension('photo.j p g')).toBe('');
    expect(safeExtension('photo.abcdefghijklmnopq')).toBe('');
  });
});

describe('StorageService', () => {
  let tmp: string;
  let storage: StorageService;

  beforeEach(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), 'photodrop-storage-'));
    storage = new StorageService(path.join(tmp, 'nested', 'uploads'));
    await storage.ensureReady();
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it('creates the root idempotently', async () => {
    await storage.ensureReady();
    const stat = await fsp.stat(storage.root);
    expect(stat.isDirectory()).toBe(true);
  });

  it('fails to get ready when the root cannot be created', async () => {
    const blocker = path.join(tmp, 'not-a-dir');
    await fsp.writeFile(blocker, 'x');
    await expect(new StorageService(path.join(blocker, 'uploads')).ensureReady()).rejects.toBeInstanceOf(
      StorageError
    );
  });

  it('writes the full stream under a generated name', async () => {
    const filename = await storage.save(Readable.from([Buffer.from('abc'), Buffer.from('def')]), 'cat.jpg');

    expect(filename).toMatch(UUID_NAME);
    expect(filename.endsWith('.jpg')).toBe(true);
    expect(filename).not.toBe('cat.jpg');
    expect(await fsp.readFile(path.join(storage.root, filename), 'utf8')).toBe('abcdef');
  });

  it('never reuses a name for identical originals', async () => {
    const [a, b] = await Promise.all([
      storage.save(Readable.from([Buffer.from('one')]), 'same.png'),
      storage.save(Readable.from([Buffer.from('two')]), 'same.png')
    ]);

    expect(a).not.toBe(b);
    expect((await fsp.readdir(storage.root)).sort()).toEqual([a, b].sort());
  });

  it('cleans up after a failed write', async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error('client went away'));
      }
    });

    await expect(storage.save(broken, 'cat.jpg')).rejects.toBeInstanceOf(StorageError);
    expect(await fsp.readdir(storage.root)).toEqual([]);
  });

  it('resolves only names inside the root', () => {
    expect(storage.resolve('abc.jpg')).toBe(path.join(storage.root, 'abc.jpg'));
    expect(storage.resolve('../secret.txt')).toBeUndefined();
    expect(storage.resolve('sub/abc.jpg')).toBeUndefined();
    expect(storage.resolve('.env')).toBeUndefined();
    expect(storage.resolve('a..b')).toBeUndefined();
    expect(storage.resolve('')).toBeUndefined();
  });

  it('removes files and ignores missing ones', async () => {
    const filename = await storage.save(Readable.from([Buffer.from('bytes')]), 'x.gif');
    await storage.remove(filename);
    await storage.remove(filename);
    expect(await fsp.readdir(storage.root)).toEqual([]);
  });

  it('refuses to remove unsafe names', async () => {
    await expect(storage.remove('../x')).rejects.toBeInstanceOf(StorageError);
  });

  it('maps extensions to content types', () => {
    expect(storage.contentTypeFor('a.JPG')).toBe('image/jpeg');
    expect(storage.contentTypeFor('a.svg')).toBe('image/svg+xml');
    expect(storage.contentTypeFor('a')).toBe('application/octet-stream');
  });
});
