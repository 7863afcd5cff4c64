/**
 * Request and response shapes
 *
 * The JSON schemas are what Fastify validates and serializes with; the
 * interfaces mirror them for handler code.
 */

import type { ImageMetadata } from '@photodrop/db';

/** Form fields accepted alongside the uploaded file */
export interface ImageMetadataCreate {
  uploader_name?: string | null;
  location?: string | null;
}

/** A metadata record as returned to clients */
export interface ImageMetadataDisplay {
  id: number;
  filename: string;
  original_filename: string;
  uploader_name: string | null;
  upload_timestamp: string;
  location: string | null;
}

export interface ListImagesQuery {
  skip: number;
  limit: number;
}

export interface ImageParams {
  id: number;
}

export interface UploadParams {
  filename: string;
}

export const DEFAULT_LIMIT = 100;

export function toDisplay(record: ImageMetadata): ImageMetadataDisplay {
  return {
    id: record.id,
    filename: record.filename,
    original_filename: record.originalFilename,
    uploader_name: record.uploaderName,
    upload_timestamp: record.uploadTimestamp,
    location: record.location
  };
}

export const imageMetadataDisplaySchema = {
  type: 'object',
  required: ['id', 'filename', 'original_filename', 'uploader_name', 'upload_timestamp', 'location'],
  properties: {
    id: { type: 'integer' },
    filename: { type: 'string' },
    original_filename: { type: 'string' },
    uploader_name: { type: ['string', 'null'] },
    upload_timestamp: { type: 'string', format: 'date-time' },
    location: { type: ['string', 'null'] }
  }
} as const;

export const listImagesQuerySchema = {
  type: 'object',
  properties: {
    skip: { type: 'integer', minimum: 0, default: 0 },
    limit: { type: 'integer', minimum: 1, default: DEFAULT_LIMIT }
  },
  additionalProperties: false
} as const;

export const imageParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer' }
  }
} as const;

export const uploadParamsSchema = {
  type: 'object',
  required: ['filename'],
  properties: {
    filename: { type: 'string', minLength: 1 }
  }
} as const;
