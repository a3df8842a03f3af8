// =============================================================
// File: server/database/migrations/003_manufacturing.ts
// Description: Master recipes and production batches with their
//              serials and per-batch recipe snapshot.
//              Batch lifecycle: DRAFT → IN_PROCESS → DONE
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('recipes', (t) => {
    t.string('id', 16).primary();
    t.string('final_product_id', 16).notNullable().unique().references('id').inTable('items');
    t.string('name', 200).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
  });

  await knex.schema.createTable('recipe_items', (t) => {
    t.string('id', 16).primary();
    t.string('recipe_id', 16).notNullable().references('id').inTable('recipes');
    t.string('raw_item_id', 16).notNullable().references('id').inTable('items');
    t.decimal('quantity_per_unit', 15, 4).notNullable();

    t.unique(['recipe_id', 'raw_item_id']);
    t.check('?? > 0', ['quantity_per_unit'], 'recipe_items_quantity_positive');
  });

  await knex.schema.createTable('production_batches', (t) => {
    t.string('id', 16).primary();
    t.string('final_product_id', 16).notNullable().references('id').inTable('items');
    t.integer('quantity_produced').notNullable();
    t.enu('stage', ['DRAFT', 'IN_PROCESS', 'DONE']).notNullable().defaultTo('DRAFT');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();

    t.check('?? >= 1', ['quantity_produced'], 'production_batches_quantity_positive');
    t.index(['final_product_id', 'stage']);
  });

  await knex.schema.createTable('production_serials', (t) => {
    t.string('id', 16).primary();
    t.string('production_batch_id', 16).notNullable().references('id').inTable('production_batches');
    t.string('final_product_id', 16).notNullable().references('id').inTable('items');
    t.string('serial_number', 100).notNullable();
    t.index(['production_batch_id']);
  });
  // serials are unique regardless of case
  await knex.raw('CREATE UNIQUE INDEX production_serials_serial_lower_unique ON production_serials (lower(serial_number))');

  await knex.schema.createTable('production_batch_recipe_items', (t) => {
    t.string('id', 16).primary();
    t.string('production_batch_id', 16).notNullable().references('id').inTable('production_batches');
    t.string('raw_item_id', 16).notNullable().references('id').inTable('items');
    t.decimal('quantity_per_unit', 15, 4).notNullable();

    t.unique(['production_batch_id', 'raw_item_id']);
    t.check('?? > 0', ['quantity_per_unit'], 'batch_recipe_items_quantity_positive');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('production_batch_recipe_items');
  await knex.schema.dropTableIfExists('production_serials');
  await knex.schema.dropTableIfExists('production_batches');
  await knex.schema.dropTableIfExists('recipe_items');
  await knex.schema.dropTableIfExists('recipes');
}
