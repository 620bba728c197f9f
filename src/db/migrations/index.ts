import { Knex } from 'knex';
import * as inventorySchema from './001_inventory_schema';

type NamedMigration = Knex.Migration & { name: string };

const migrations: NamedMigration[] = [inventorySchema];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (migration) => migration.name,
  getMigration: async (migration) => migration,
};
