/**
 * Health check routes
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { withSession } from '@photodrop/db';
import { ApiError } from '../error.js';

export interface HealthResponse {
  status: 'ok';
  version: string;
  uptime: number;
  timestamp: string;
}

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  // GET /health
  fastify.get('/health', async () => {
    const response: HealthResponse = {
      status: 'ok',
      version: process.env['npm_package_version'] ?? '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString()
    };
    return response;
  });

  // GET /health/ready - readiness probe, checks the database
  fastify.get('/health/ready', async () => {
    const db = fastify.deployment.db();
    try {
      await db.ping();
      const images = await withSession(db, session => session.imageMetadata.count());
      return { ready: true, images };
    } catch (err) {
      throw ApiError.serviceUnavailable('Database unavailable', err);
    }
  });
};
