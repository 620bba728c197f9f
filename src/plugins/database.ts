import fastifyPlugin from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import knex, { Knex } from 'knex';
import { env } from '../config/env';

export type DatabasePluginOptions = {
  logQueries?: boolean;
};

declare module 'fastify' {
  interface FastifyInstance {
    db: Knex;
  }
}

export const createDatabase = (): Knex =>
  knex({
    client: 'pg',
    connection: {
      connectionString: env.DATABASE_URL,
      statement_timeout: env.DB_STATEMENT_TIMEOUT_MS,
    },
    pool: { min: env.DB_POOL_MIN, max: env.DB_POOL_MAX },
  });

const databasePlugin = fastifyPlugin(
  async (fastify: FastifyInstance, options: DatabasePluginOptions) => {
    const db = createDatabase();

    if (options.logQueries) {
      db.on('query', (query: Knex.Sql) => {
        fastify.log.debug({ sql: query.sql }, 'query');
      });
    }

    fastify.decorate('db', db);

    fastify.addHook('onClose', async () => {
      await db.destroy();
    });
  },
  {
    name: 'database',
  },
);

export default databasePlugin;
