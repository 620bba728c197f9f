import { Knex } from 'knex';
import { StockSettings } from '../config/stock';
import { createTestDatabase } from './database';

export const TEST_USER_ID = 7;

/**
 * Builds the server on a fresh in-memory database. The environment is set
 * before the server module loads, since configuration is read at import.
 */
export const startTestServer = async (stockSettings?: Partial<StockSettings>) => {
  process.env.NODE_ENV = 'test';
  process.env.JWT_SECRET = 'test-secret-jwt-value-should-be-long-123456';
  process.env.DATABASE_URL = 'postgres://localhost/test';
  const { buildServer } = await import('../server');

  const db: Knex = await createTestDatabase();
  const server = buildServer({ db, logger: false, stockSettings });
  await server.ready();

  const token = server.jwt.sign({ sub: TEST_USER_ID });
  return { server, db, authHeaders: { authorization: `Bearer ${token}` } };
};

export type TestServer = Awaited<ReturnType<typeof startTestServer>>;
