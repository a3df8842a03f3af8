// =============================================================
// File: server/database/migrations/005_expense_categories.ts
// Description: Expense categories. Existing expenses keep a null
//              category.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('expense_categories', (t) => {
    t.string('id', 16).primary();
    t.string('name', 100).notNullable().unique();
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
  });

  await knex.schema.alterTable('expenses', (t) => {
    t.string('expense_category_id', 16).nullable().references('id').inTable('expense_categories');
    t.index(['expense_category_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('expenses', (t) => {
    t.dropIndex(['expense_category_id']);
    t.dropForeign(['expense_category_id']);
    t.dropColumn('expense_category_id');
  });
  await knex.schema.dropTableIfExists('expense_categories');
}
