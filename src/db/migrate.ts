import 'dotenv/config';
import { createDatabase } from '../plugins/database';
import { migrationSource } from './migrations';

const db = createDatabase();

async function main() {
  const direction = process.argv[2] === 'down' ? 'down' : 'latest';

  if (direction === 'down') {
    const [, rolledBack] = await db.migrate.rollback({ migrationSource });
    console.info('Rolled back migrations', { migrations: rolledBack });
    return;
  }

  const [batch, applied] = await db.migrate.latest({ migrationSource });
  console.info('Applied migrations', { batch, migrations: applied });
}

main()
  .catch((error) => {
    console.error('Failed to run migrations', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await db.destroy();
  });
