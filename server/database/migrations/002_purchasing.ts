// =============================================================
// File: server/database/migrations/002_purchasing.ts
// Description: Purchase invoices with their lines and payments,
//              and expenses.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('purchase_invoices', (t) => {
    t.string('id', 16).primary();
    t.string('supplier_id', 16).notNullable().references('id').inTable('users');
    t.string('invoice_date', 10).notNullable(); // YYYY-MM-DD
    t.decimal('total_amount', 15, 2).notNullable().defaultTo(0);
    t.decimal('paid_amount', 15, 2).notNullable().defaultTo(0);
    t.decimal('balance_due', 15, 2).notNullable().defaultTo(0);
    t.enu('payment_status', ['UNPAID', 'PARTIAL', 'PAID']).notNullable().defaultTo('UNPAID');
    t.text('notes');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();

    t.check('?? >= 0 AND ?? >= 0', ['paid_amount', 'balance_due'], 'purchase_invoices_amounts_non_negative');
    t.index(['supplier_id', 'invoice_date']);
    t.index(['payment_status']);
  });

  await knex.schema.createTable('purchase_items', (t) => {
    t.string('id', 16).primary();
    t.string('purchase_invoice_id', 16).notNullable().references('id').inTable('purchase_invoices');
    t.integer('line_number').notNullable();
    t.string('item_id', 16).notNullable().references('id').inTable('items');
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 15, 2).notNullable();
    t.decimal('line_total', 15, 2).notNullable();

    t.check('?? > 0', ['quantity'], 'purchase_items_quantity_positive');
    t.check('?? > 0', ['unit_price'], 'purchase_items_price_positive');
    t.index(['purchase_invoice_id']);
  });

  await knex.schema.createTable('payments', (t) => {
    t.string('id', 16).primary();
    t.string('user_id', 16).notNullable().references('id').inTable('users');
    t.string('purchase_invoice_id', 16).notNullable().references('id').inTable('purchase_invoices');
    t.decimal('amount', 15, 2).notNullable();
    t.string('account_id', 16).notNullable().references('id').inTable('payment_accounts');
    t.enu('payment_type', ['FULL', 'PARTIAL', 'UN_PAID']).notNullable();
    t.string('direct_payment_id', 16);
    t.timestamp('created_at', { useTz: true }).notNullable();

    t.check('?? > 0', ['amount'], 'payments_amount_positive');
    t.index(['purchase_invoice_id']);
    t.index(['direct_payment_id']);
  });

  await knex.schema.createTable('expenses', (t) => {
    t.string('id', 16).primary();
    t.string('name', 200).notNullable();
    t.decimal('amount', 15, 2).notNullable();
    t.string('account_id', 16).notNullable().references('id').inTable('payment_accounts');
    t.string('user_id', 16).notNullable().references('id').inTable('users');
    t.string('expense_date', 10).notNullable();
    t.text('description');
    t.timestamp('created_at', { useTz: true }).notNullable();

    t.check('?? > 0', ['amount'], 'expenses_amount_positive');
    t.index(['expense_date']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('expenses');
  await knex.schema.dropTableIfExists('payments');
  await knex.schema.dropTableIfExists('purchase_items');
  await knex.schema.dropTableIfExists('purchase_invoices');
}
