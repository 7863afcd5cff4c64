import { FastifyInstance, FastifyPluginAsync } from 'fastify';

export const WELCOME_MESSAGE = 'Welcome to photodrop';

export const rootRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  // GET /
  fastify.get('/', async () => ({ message: WELCOME_MESSAGE }));
};
