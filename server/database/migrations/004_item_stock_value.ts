// =============================================================
// File: server/database/migrations/004_item_stock_value.ts
// Description: Carries each item's total stock value next to its
//              quantity. avg_cost is derived from it from now on.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable('items', (t) => {
    t.decimal('stock_value', 24, 6).notNullable().defaultTo(0);
  });

  await knex('items').update({ stock_value: knex.raw('?? * ??', ['total_quantity', 'avg_cost']) });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('items', (t) => {
    t.dropColumn('stock_value');
  });
}
