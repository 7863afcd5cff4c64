import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { LocalDeployment, type OrphanPolicy } from '@photodrop/services';
import { createApp } from './app.js';

export type FormPart =
  | { name: string; value: string }
  | { name: string; filename: string; contentType: string; content: Buffer };

const BOUNDARY = '----photodrop-test-boundary';

/**
 * Encode parts as a multipart/form-data body for `app.inject`.
 */
export function multipartForm(parts: FormPart[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    if ('value' in part) {
      chunks.push(
        Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"\r\n\r\n${part.value}\r\n`)
      );
    } else {
      chunks.push(
        Buffer.from(
          `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n` +
            `Content-Type: ${part.contentType}\r\n\r\n`
        ),
        part.content,
        Buffer.from('\r\n')
      );
    }
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` }
  };
}

export function imageFile(filename: string, content: Buffer, contentType = 'image/jpeg'): FormPart {
  return { name: 'upload_file', filename, contentType, content };
}

export interface TestServer {
  app: FastifyInstance;
  deployment: LocalDeployment;
  uploadDir: string;
  close(): Promise<void>;
}

export async function startTestServer(
  options: { orphanPolicy?: OrphanPolicy; maxUploadBytes?: number; allowedMimeTypes?: string[] } = {}
): Promise<TestServer> {
  const tmp = await fsp.mkdtemp(path.join(os.tmpdir(), 'photodrop-server-'));
  const uploadDir = path.join(tmp, 'uploads');
  const deployment = await LocalDeployment.create({
    databaseUrl: 'sqlite::memory:',
    uploadDir,
    orphanPolicy: options.orphanPolicy ?? 'delete'
  });
  const app = await createApp({
    deployment,
    logger: false,
    maxUploadBytes: options.maxUploadBytes,
    allowedMimeTypes: options.allowedMimeTypes
  });

  return {
    app,
    deployment,
    uploadDir,
    close: async () => {
      await app.close();
      await deployment.cleanup();
      await fsp.rm(tmp, { recursive: true, force: true });
    }
  };
}
