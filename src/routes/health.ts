import { FastifyInstance } from 'fastify';
import { failure } from '../utils/response';

const registerHealthRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/healthz', async () => ({ status: 'ok' }));

  fastify.get('/readyz', async (request, reply) => {
    try {
      await fastify.db.raw('select 1');
    } catch (error) {
      request.log.error({ err: error }, 'Database readiness check failed');
      reply.code(503).send(failure('NOT_READY', 'Database unavailable'));
      return;
    }
    return { status: 'ready' };
  });
};

export default registerHealthRoutes;
