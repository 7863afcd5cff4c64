/**
 * Uploaded file routes
 *
 * GET /uploads/:filename - raw bytes of a stored image
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import { ApiError } from '../error.js';
import { uploadParamsSchema, type UploadParams } from '../schemas.js';

function isMissing(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

export const uploadRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const storage = () => fastify.deployment.storage();

  fastify.get<{ Params: UploadParams }>(
    '/uploads/:filename',
    { schema: { params: uploadParamsSchema } },
    async (request, reply) => {
      const { filename } = request.params;
      const filePath = storage().resolve(filename);

      if (!filePath) {
        throw ApiError.notFound('File not found');
      }

      let size: number;
      try {
        const stat = await fsp.stat(filePath);
        if (!stat.isFile()) {
          throw ApiError.notFound('File not found');
        }
        size = stat.size;
      } catch (err) {
        if (isMissing(err)) {
          throw ApiError.notFound('File not found');
        }
        throw err;
      }

      return reply
        .header('Content-Type', storage().contentTypeFor(filename))
        .header('Content-Length', size)
        .header('Cache-Control', 'public, max-age=31536000, immutable') // names are never reused
        .header('X-Content-Type-Options', 'nosniff')
        .send(fs.createReadStream(filePath));
    }
  );
};
