/**
 * Fastify app setup
 *
 * The deployment (database, storage, image service) is decorated onto the
 * instance and reached as `fastify.deployment` in every route.
 */

import Fastify, { FastifyBaseLogger, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { DEFAULT_CONFIG, type Deployment } from '@photodrop/services';
import { ApiError, errorHandler, formatErrorResponse } from './error.js';
import { healthRoutes } from './routes/health.js';
import { imageRoutes } from './routes/images.js';
import { rootRoutes } from './routes/root.js';
import { uploadRoutes } from './routes/uploads.js';

export interface ServerConfig {
  deployment: Deployment;
  /** `false` silences logging; a pino instance is used as-is */
  logger?: boolean | FastifyBaseLogger;
  maxUploadBytes?: number;
  /** Upload content types to accept; empty or absent accepts any */
  allowedMimeTypes?: string[];
}

export interface ListenConfig {
  port: number;
  host?: string;
}

export async function createApp(config: ServerConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.logger ?? true,
    ignoreTrailingSlash: true
  });

  const maxUploadBytes = config.maxUploadBytes ?? DEFAULT_CONFIG.maxUploadBytes;

  await app.register(cors, {
    origin: true
  });

  // Oversized files are truncated rather than thrown so the route can
  // remove what was written and answer 413 itself
  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: {
      fileSize: maxUploadBytes,
      files: 5
    }
  });

  app.decorate('deployment', config.deployment);
  app.decorate('maxUploadBytes', maxUploadBytes);
  app.decorate(
    'allowedMimeTypes',
    (config.allowedMimeTypes ?? DEFAULT_CONFIG.allowedMimeTypes).map(type => type.toLowerCase())
  );

  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send(formatErrorResponse(ApiError.notFound(`Route ${request.method} ${request.url} not found`)));
  });

  await app.register(rootRoutes);
  await app.register(healthRoutes);
  await app.register(imageRoutes);
  await app.register(uploadRoutes);

  return app;
}

export async function startServer(config: ServerConfig & ListenConfig): Promise<FastifyInstance> {
  const app = await createApp(config);

  app.addHook('onClose', async () => {
    await config.deployment.cleanup();
  });

  try {
    await app.listen({
      port: config.port,
      host: config.host ?? DEFAULT_CONFIG.host
    });
    return app;
  } catch (err) {
    app.log.error({ err }, 'Failed to listen');
    await app.close();
    throw err;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    deployment: Deployment;
    maxUploadBytes: number;
    allowedMimeTypes: string[];
  }
}
