// =============================================================
// File: server/database/migrations/001_inventory_core.ts
// Description: Counterparties, payment accounts, items and the
//              two append-only ledgers (stock and financial),
//              plus manual stock adjustments.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // users: owners (login) and counterparties (suppliers, customers)
  // ============================================================
  await knex.schema.createTable('users', (t) => {
    t.string('id', 16).primary();
    t.string('name', 200).notNullable();
    t.string('email', 255).unique();
    t.string('password_hash', 255);
    t.enu('role', ['owner', 'supplier', 'customer']).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.index(['role']);
  });

  await knex.schema.createTable('payment_accounts', (t) => {
    t.string('id', 16).primary();
    t.string('name', 100).notNullable().unique();
    t.enu('type', ['cash', 'bank', 'wallet']).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();
  });

  // ============================================================
  // items: aggregate fields are written only by the item repository
  // ============================================================
  await knex.schema.createTable('items', (t) => {
    t.string('id', 16).primary();
    t.string('name', 200).notNullable();
    t.enu('kind', ['RAW_MATERIAL', 'FINAL_PRODUCT']).notNullable();
    t.enu('unit_type', ['PCS', 'SET']).notNullable().defaultTo('PCS');
    t.integer('total_quantity').notNullable().defaultTo(0);
    t.decimal('avg_cost', 18, 6).notNullable().defaultTo(0);
    t.decimal('avg_price', 15, 2).notNullable().defaultTo(0);
    t.decimal('standard_cost', 15, 2).notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();

    t.check('?? >= 0', ['total_quantity'], 'items_quantity_non_negative');
    t.check('?? >= 0', ['avg_cost'], 'items_avg_cost_non_negative');
    t.index(['kind']);
  });

  // ============================================================
  // stock_ledger: one row per movement, exactly one side non-zero
  // ============================================================
  await knex.schema.createTable('stock_ledger', (t) => {
    t.string('id', 16).primary();
    t.string('item_id', 16).notNullable().references('id').inTable('items');
    t.enu('ref_type', ['PURCHASE', 'SALE', 'PRODUCTION', 'ADJUSTMENT']).notNullable();
    t.string('ref_id', 16).notNullable();
    t.integer('qty_in').notNullable().defaultTo(0);
    t.integer('qty_out').notNullable().defaultTo(0);
    t.decimal('unit_price', 15, 2).notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable();

    t.check('(?? > 0 AND ?? = 0) OR (?? = 0 AND ?? > 0)', ['qty_in', 'qty_out', 'qty_in', 'qty_out'], 'stock_ledger_one_side');
    t.index(['item_id', 'created_at']);
    t.index(['ref_type', 'ref_id']);
  });

  // ============================================================
  // financial_ledger: balance per user = Σdebit − Σcredit
  // ============================================================
  await knex.schema.createTable('financial_ledger', (t) => {
    t.string('id', 16).primary();
    t.string('user_id', 16).notNullable().references('id').inTable('users');
    t.enu('ref_type', [
      'PURCHASE',
      'PURCHASE_UPDATE',
      'PAYMENT',
      'DIRECT_PAYMENT',
      'PAYMENT_REVERSAL',
      'EXPENSE',
      'SALE',
    ]).notNullable();
    t.string('ref_id', 16).notNullable();
    t.decimal('debit', 15, 2).notNullable().defaultTo(0);
    t.decimal('credit', 15, 2).notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable();

    t.check('?? >= 0 AND ?? >= 0', ['debit', 'credit'], 'financial_ledger_non_negative');
    t.index(['user_id', 'created_at']);
    t.index(['ref_type', 'ref_id']);
  });

  await knex.schema.createTable('stock_adjustments', (t) => {
    t.string('id', 16).primary();
    t.string('item_id', 16).notNullable().references('id').inTable('items');
    t.enu('direction', ['in', 'out']).notNullable();
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 15, 2).notNullable().defaultTo(0);
    t.string('reason', 255).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable();

    t.check('?? > 0', ['quantity'], 'stock_adjustments_quantity_positive');
    t.index(['item_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('stock_adjustments');
  await knex.schema.dropTableIfExists('financial_ledger');
  await knex.schema.dropTableIfExists('stock_ledger');
  await knex.schema.dropTableIfExists('items');
  await knex.schema.dropTableIfExists('payment_accounts');
  await knex.schema.dropTableIfExists('users');
}
