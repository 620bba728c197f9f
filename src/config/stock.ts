import { env } from './env';

export type StockSettings = {
  /** Warehouse credited by collections that name none. */
  defaultWarehouseId: number;
  /** Decimal quantity under which a level counts as low stock. */
  lowStockThreshold: number;
};

declare module 'fastify' {
  interface FastifyInstance {
    stockSettings: StockSettings;
  }
}

export const stockSettingsFromEnv = (): StockSettings => ({
  defaultWarehouseId: env.DEFAULT_WAREHOUSE_ID,
  lowStockThreshold: env.LOW_STOCK_THRESHOLD,
});
