// Catalog, warehouses, ledger, sales, procurement, collections and transfers.
// Quantities are integer thousandths, money is integer cents.

import { Knex } from 'knex';

export const name = '001_inventory_schema';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('warehouses', (t) => {
    t.increments('id').primary();
    t.string('name', 100).notNullable();
    t.string('type', 50).notNullable();
    t.text('address');
    t.check(`type IN ('store', 'factory', 'distribution_center')`, undefined, 'chk_warehouses_type');
  });

  await knex.schema.createTable('suppliers', (t) => {
    t.increments('id').primary();
    t.string('name', 100).notNullable();
    t.string('phone', 50);
    t.text('location');
  });

  await knex.schema.createTable('categories', (t) => {
    t.increments('id').primary();
    t.string('name', 100).notNullable();
  });

  await knex.schema.createTable('product_families', (t) => {
    t.increments('id').primary();
    t.integer('category_id').notNullable().references('id').inTable('categories');
    t.string('name', 100).notNullable();
    t.text('description');
    t.index(['category_id'], 'idx_product_families_category_id');
  });

  await knex.schema.createTable('product_variants', (t) => {
    t.increments('id').primary();
    t.integer('family_id').notNullable().references('id').inTable('product_families');
    t.string('name', 100).notNullable();
    t.string('sku', 100).notNullable().unique();
    t.string('barcode', 100).unique();
    t.string('unit', 30).notNullable().defaultTo('unit');
    t.bigInteger('cost_price_cents').notNullable().defaultTo(0);
    t.bigInteger('selling_price_cents').notNullable().defaultTo(0);
    t.boolean('is_manufactured').notNullable().defaultTo(false);
    t.bigInteger('conversion_factor_milli').notNullable().defaultTo(1000);
    t.index(['family_id'], 'idx_product_variants_family_id');
    t.check('conversion_factor_milli >= 0', undefined, 'chk_product_variants_conversion_factor');
  });

  await knex.schema.createTable('inventory_levels', (t) => {
    t.increments('id').primary();
    t.integer('warehouse_id').notNullable().references('id').inTable('warehouses').onDelete('CASCADE');
    t.integer('variant_id').notNullable().references('id').inTable('product_variants').onDelete('CASCADE');
    t.bigInteger('quantity_milli').notNullable().defaultTo(0);
    t.string('batch_number', 100);
    t.date('expiry_date');
    t.unique(['warehouse_id', 'variant_id'], { indexName: 'uq_inventory_levels_warehouse_variant' });
    t.index(['variant_id'], 'idx_inventory_levels_variant_id');
    // Last line of defence against oversell when two writers interleave.
    t.check('quantity_milli >= 0', undefined, 'chk_inventory_levels_quantity_nonnegative');
  });

  await knex.schema.createTable('sales', (t) => {
    t.increments('id').primary();
    t.integer('warehouse_id').notNullable().references('id').inTable('warehouses');
    t.string('customer_name', 255);
    t.bigInteger('subtotal_cents').notNullable().defaultTo(0);
    t.bigInteger('tax_cents').notNullable().defaultTo(0);
    t.bigInteger('discount_cents').notNullable().defaultTo(0);
    t.bigInteger('total_cents').notNullable().defaultTo(0);
    t.string('payment_method', 50).notNullable();
    t.integer('processed_by_user_id').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['warehouse_id'], 'idx_sales_warehouse_id');
    t.index(['created_at'], 'idx_sales_created_at');
    t.check(
      `payment_method IN ('cash', 'card', 'upi', 'credit', 'other')`,
      undefined,
      'chk_sales_payment_method',
    );
  });

  await knex.schema.createTable('sale_items', (t) => {
    t.increments('id').primary();
    t.integer('sale_id').notNullable().references('id').inTable('sales').onDelete('CASCADE');
    t.integer('position').notNullable();
    t.integer('variant_id').notNullable().references('id').inTable('product_variants');
    t.bigInteger('quantity_milli').notNullable();
    t.bigInteger('unit_price_cents').notNullable();
    t.bigInteger('line_total_cents').notNullable();
    t.index(['sale_id'], 'idx_sale_items_sale_id');
  });

  await knex.schema.createTable('procurements', (t) => {
    t.increments('id').primary();
    t.integer('supplier_id').notNullable().references('id').inTable('suppliers');
    t.integer('warehouse_id').notNullable().references('id').inTable('warehouses');
    t.integer('ordered_by_user_id').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.date('expected_delivery');
    t.string('status', 50).notNullable().defaultTo('pending');
    t.index(['supplier_id'], 'idx_procurements_supplier_id');
    t.index(['status'], 'idx_procurements_status');
    t.check(
      `status IN ('pending', 'approved', 'ordered', 'partial', 'received', 'cancelled')`,
      undefined,
      'chk_procurements_status',
    );
  });

  await knex.schema.createTable('procurement_items', (t) => {
    t.increments('id').primary();
    t.integer('procurement_id').notNullable().references('id').inTable('procurements').onDelete('CASCADE');
    t.integer('variant_id').notNullable().references('id').inTable('product_variants');
    t.bigInteger('quantity_ordered_milli').notNullable();
    t.bigInteger('quantity_received_milli').notNullable().defaultTo(0);
    t.bigInteger('unit_cost_cents').notNullable();
    t.index(['procurement_id'], 'idx_procurement_items_procurement_id');
  });

  await knex.schema.createTable('collections', (t) => {
    t.increments('id').primary();
    t.integer('variant_id').notNullable().references('id').inTable('product_variants');
    t.integer('supplier_id').notNullable().references('id').inTable('suppliers');
    t.integer('agent_id').notNullable();
    t.integer('warehouse_id').notNullable().references('id').inTable('warehouses');
    t.bigInteger('weight_milli').notNullable();
    t.timestamp('collected_at', { useTz: true }).notNullable();
    t.text('notes');
    t.index(['supplier_id'], 'idx_collections_supplier_id');
    t.index(['collected_at'], 'idx_collections_collected_at');
  });

  await knex.schema.createTable('inventory_transfers', (t) => {
    t.increments('id').primary();
    t.integer('source_warehouse_id').notNullable().references('id').inTable('warehouses');
    t.integer('destination_warehouse_id').notNullable().references('id').inTable('warehouses');
    t.integer('authorized_by_user_id').notNullable();
    t.timestamp('transferred_at', { useTz: true }).notNullable();
    t.string('status', 50).notNullable().defaultTo('pending');
    t.check(
      `status IN ('pending', 'in_transit', 'completed', 'cancelled')`,
      undefined,
      'chk_inventory_transfers_status',
    );
    t.check('source_warehouse_id <> destination_warehouse_id', undefined, 'chk_inventory_transfers_distinct');
  });

  await knex.schema.createTable('inventory_transfer_items', (t) => {
    t.increments('id').primary();
    t.integer('transfer_id').notNullable().references('id').inTable('inventory_transfers').onDelete('CASCADE');
    t.integer('variant_id').notNullable().references('id').inTable('product_variants');
    t.bigInteger('quantity_milli').notNullable();
    t.index(['transfer_id'], 'idx_inventory_transfer_items_transfer_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('inventory_transfer_items');
  await knex.schema.dropTableIfExists('inventory_transfers');
  await knex.schema.dropTableIfExists('collections');
  await knex.schema.dropTableIfExists('procurement_items');
  await knex.schema.dropTableIfExists('procurements');
  await knex.schema.dropTableIfExists('sale_items');
  await knex.schema.dropTableIfExists('sales');
  await knex.schema.dropTableIfExists('inventory_levels');
  await knex.schema.dropTableIfExists('product_variants');
  await knex.schema.dropTableIfExists('product_families');
  await knex.schema.dropTableIfExists('categories');
  await knex.schema.dropTableIfExists('suppliers');
  await knex.schema.dropTableIfExists('warehouses');
}
