/**
 * Images routes
 *
 * POST /upload       - upload an image with optional uploader name and location
 * GET  /images/      - list metadata records (skip/limit)
 * GET  /images/:id   - one metadata record
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { ImageMetadata } from '@photodrop/db';
import { ApiError } from '../error.js';
import {
  imageMetadataDisplaySchema,
  imageParamsSchema,
  listImagesQuerySchema,
  toDisplay,
  type ImageMetadataCreate,
  type ImageParams,
  type ListImagesQuery
} from '../schemas.js';

/** Multipart field carrying the image */
export const UPLOAD_FIELD = 'upload_file';

interface SavedUpload {
  filename: string;
  originalFilename: string;
}

export const imageRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const images = () => fastify.deployment.images();

  // POST /upload - Upload image and metadata (multipart)
  fastify.post(
    '/upload',
    { schema: { response: { 200: imageMetadataDisplaySchema } } },
    async (request) => {
      if (!request.isMultipart()) {
        throw ApiError.badRequest('Expected multipart/form-data');
      }

      const fields: ImageMetadataCreate = {};
      let saved: SavedUpload | undefined;

      try {
        for await (const part of request.parts()) {
          if (part.type === 'field') {
            const value = typeof part.value === 'string' ? part.value : null;
            if (part.fieldname === 'uploader_name') {
              fields.uploader_name = value;
            } else if (part.fieldname === 'location') {
              fields.location = value;
            }
            continue;
          }

          // Only the first upload_file is stored; anything else is drained
          if (part.fieldname !== UPLOAD_FIELD || saved) {
            part.file.resume();
            continue;
          }

          // An empty allow-list accepts any content type
          const allowed = fastify.allowedMimeTypes;
          if (allowed.length > 0 && !allowed.includes(part.mimetype.toLowerCase())) {
            part.file.resume();
            throw ApiError.badRequest('Invalid file type', { allowed });
          }
          if (!part.filename) {
            part.file.resume();
            throw ApiError.badRequest('Uploaded file has no filename');
          }

          const filename = await images().saveFile(part.file, part.filename);
          if (part.file.truncated) {
            await images().discard(filename);
            throw ApiError.payloadTooLarge('File too large', { maxSize: fastify.maxUploadBytes });
          }
          saved = { filename, originalFilename: part.filename };
        }
      } catch (err) {
        // The request failed after the file was stored; it will never get a record
        if (saved) {
          await images().discard(saved.filename);
        }
        throw err;
      }

      if (!saved) {
        throw ApiError.badRequest('No file uploaded', { field: UPLOAD_FIELD });
      }

      request.log.info(
        {
          originalFilename: saved.originalFilename,
          uploaderName: fields.uploader_name ?? null,
          location: fields.location ?? null
        },
        'Received upload'
      );

      let record: ImageMetadata;
      try {
        record = await images().recordUpload({
          filename: saved.filename,
          originalFilename: saved.originalFilename,
          uploaderName: fields.uploader_name,
          location: fields.location
        });
      } catch (err) {
        throw ApiError.internalError('Failed to create image metadata', err);
      }

      return toDisplay(record);
    }
  );

  // GET /images/ - List image metadata
  fastify.get<{ Querystring: ListImagesQuery }>(
    '/images',
    {
      schema: {
        querystring: listImagesQuerySchema,
        response: { 200: { type: 'array', items: imageMetadataDisplaySchema } }
      }
    },
    async (request) => {
      const { skip, limit } = request.query;
      const records = await images().list({ skip, limit });

      request.log.debug({ skip, limit, found: records.length }, 'Listed image metadata');

      return records.map(toDisplay);
    }
  );

  // GET /images/:id - Get image metadata by ID
  fastify.get<{ Params: ImageParams }>(
    '/images/:id',
    { schema: { params: imageParamsSchema, response: { 200: imageMetadataDisplaySchema } } },
    async (request) => {
      const { id } = request.params;
      const record = await images().get(id);

      if (!record) {
        throw ApiError.notFound('Image not found');
      }

      return toDisplay(record);
    }
  );
};
