import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ImageMetadataDisplay } from '../schemas.js';
import { imageFile, multipartForm, startTestServer, type TestServer } from '../test-helpers.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('GET /uploads/:filename', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it('serves the stored bytes', async () => {
    const created = await server.app.inject({
      method: 'POST',
      url: '/upload',
      ...multipartForm([imageFile('tree.png', PNG_BYTES, 'image/png')])
    });
    const { filename } = created.json<ImageMetadataDisplay>();

    const res = await server.app.inject({ method: 'GET', url: `/uploads/${filename}` });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
    expect(res.rawPayload.equals(PNG_BYTES)).toBe(true);
  });

  it('answers 404 for a missing file', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/uploads/missing.jpg' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: 'File not found' });
  });

  it('answers 404 for names that escape the storage root', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/uploads/..%2Fsecret.txt' });

    expect(res.statusCode).toBe(404);
  });
});
