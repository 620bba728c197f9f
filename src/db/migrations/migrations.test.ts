import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { createTestDatabase } from '../../test-utils/database';
import { migrationSource } from './index';

describe('schema migrations', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDatabase({ migrate: false });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('applies and rolls back through the migration source', async () => {
    const [, applied] = await db.migrate.latest({ migrationSource });
    expect(applied).toEqual(['001_inventory_schema']);
    expect(await db.schema.hasTable('inventory_levels')).toBe(true);

    await db.migrate.rollback({ migrationSource });
    expect(await db.schema.hasTable('inventory_levels')).toBe(false);
  });

  it('enforces non-negative stock in the schema', async () => {
    await db.migrate.latest({ migrationSource });
    const [warehouse] = await db('warehouses').insert({ name: 'Main', type: 'store' }).returning('id');
    const [category] = await db('categories').insert({ name: 'Staples' }).returning('id');
    const [family] = await db('product_families').insert({ category_id: category.id, name: 'Rice' }).returning('id');
    const [variant] = await db('product_variants')
      .insert({ family_id: family.id, name: 'Rice 1kg', sku: 'R-1' })
      .returning('id');

    await expect(
      db('inventory_levels').insert({ warehouse_id: warehouse.id, variant_id: variant.id, quantity_milli: -1 }),
    ).rejects.toMatchObject({ code: 'SQLITE_CONSTRAINT_CHECK' });
  });
});
