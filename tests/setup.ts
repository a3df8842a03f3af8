/**
 * Global test setup. Each test file gets its own in-memory SQLite
 * database (see vitest.config.ts `env`), migrated through the same
 * migration source production uses.
 */

import { beforeAll, afterAll } from 'vitest';
import type { Knex } from 'knex';
import { closeDb, getDb, migrateLatest } from '../server/database/connection';

beforeAll(async () => {
  await migrateLatest();
}, 60000);

afterAll(async () => {
  await closeDb();
});

export function getTestDb(): Knex {
  return getDb();
}

// ── Tables, children before parents ─────────────────────────────────

const ALL_TABLES = [
  'production_batch_recipe_items',
  'production_serials',
  'production_batches',
  'recipe_items',
  'recipes',
  'payments',
  'purchase_items',
  'purchase_invoices',
  'expenses',
  'expense_categories',
  'stock_adjustments',
  'stock_ledger',
  'financial_ledger',
  'items',
  'payment_accounts',
  'users',
];

/** Empty every table, leaving the schema. */
export async function cleanAllData(): Promise<void> {
  const db = getTestDb();
  for (const table of ALL_TABLES) {
    await db(table).delete();
  }
}
