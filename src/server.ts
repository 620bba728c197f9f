import 'dotenv/config';
import Fastify, { FastifyInstance } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import { Knex } from 'knex';
import { ZodError } from 'zod';
import { env } from './config/env';
import { StockSettings, stockSettingsFromEnv } from './config/stock';
import { DomainError } from './domain/errors';
import databasePlugin from './plugins/database';
import registerHealthRoutes from './routes/health';
import registerSalesRoutes from './routes/sales';
import registerPurchasingRoutes from './routes/purchasing';
import registerCollectionRoutes from './routes/collections';
import registerInventoryRoutes from './routes/inventory';
import registerCatalogRoutes from './routes/catalog';
import { failure } from './utils/response';

export type BuildServerOptions = {
  db?: Knex;
  logger?: boolean;
  stockSettings?: Partial<StockSettings>;
};

const registerDatabase = (fastify: FastifyInstance, db?: Knex) => {
  if (db) {
    fastify.decorate('db', db);
    fastify.addHook('onClose', async () => {
      await fastify.db.destroy();
    });
    return;
  }

  fastify.register(databasePlugin, {
    logQueries: env.NODE_ENV !== 'production',
  });
};

export const buildServer = (options: BuildServerOptions = {}) => {
  const fastify = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
  });

  fastify.register(fastifyJwt, {
    secret: env.JWT_SECRET,
  });

  registerDatabase(fastify, options.db);
  fastify.decorate('stockSettings', { ...stockSettingsFromEnv(), ...options.stockSettings });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.status(400).send(
        failure(
          'VALIDATION_ERROR',
          'Validation failed',
          error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        ),
      );
      return;
    }

    if (error instanceof DomainError) {
      reply.status(error.statusCode).send(failure(error.code, error.message, error.details));
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send(failure(error.code, error.message));
      return;
    }

    request.log.error({ err: error }, 'Unhandled error');
    reply.status(500).send(failure('INTERNAL_ERROR', 'Internal Server Error'));
  });

  fastify.register(registerHealthRoutes);
  fastify.register(registerSalesRoutes);
  fastify.register(registerPurchasingRoutes);
  fastify.register(registerCollectionRoutes);
  fastify.register(registerInventoryRoutes);
  fastify.register(registerCatalogRoutes);

  return fastify;
};

const start = async () => {
  const server = buildServer();

  try {
    await server.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

if (env.NODE_ENV !== 'test') {
  void start();
}
