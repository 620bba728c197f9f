import 'dotenv/config';
import { env } from '../config/env';
import { createDatabase } from '../plugins/database';

const db = createDatabase();

const MAIN_WAREHOUSE_NAME = process.env.SEED_MAIN_WAREHOUSE_NAME ?? 'Main warehouse';
const MAIN_WAREHOUSE_ADDRESS = process.env.SEED_MAIN_WAREHOUSE_ADDRESS ?? null;

async function main() {
  // Collections land here unless they name another warehouse.
  await db('warehouses')
    .insert({
      id: env.DEFAULT_WAREHOUSE_ID,
      name: MAIN_WAREHOUSE_NAME,
      type: 'store',
      address: MAIN_WAREHOUSE_ADDRESS,
    })
    .onConflict('id')
    .merge(['name', 'address']);

  // The explicit id leaves the serial sequence behind.
  await db.raw(`select setval(pg_get_serial_sequence('warehouses', 'id'), (select max(id) from warehouses))`);

  console.info('Ensured main warehouse', { id: env.DEFAULT_WAREHOUSE_ID, name: MAIN_WAREHOUSE_NAME });
}

main()
  .catch((error) => {
    console.error('Failed to seed data', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await db.destroy();
  });
