import type { Knex } from 'knex';
import * as inventoryCore from './001_inventory_core';
import * as purchasing from './002_purchasing';
import * as manufacturing from './003_manufacturing';
import * as itemStockValue from './004_item_stock_value';
import * as expenseCategories from './005_expense_categories';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Migrations are registered here rather than discovered on disk so that
// the same list runs from compiled output, tsx scripts and the test runner.
const MIGRATIONS: NamedMigration[] = [
  { name: '001_inventory_core', migration: inventoryCore },
  { name: '002_purchasing', migration: purchasing },
  { name: '003_manufacturing', migration: manufacturing },
  { name: '004_item_stock_value', migration: itemStockValue },
  { name: '005_expense_categories', migration: expenseCategories },
];

class StaticMigrationSource implements Knex.MigrationSource<NamedMigration> {
  async getMigrations(): Promise<NamedMigration[]> {
    return MIGRATIONS;
  }

  getMigrationName(entry: NamedMigration): string {
    return entry.name;
  }

  async getMigration(entry: NamedMigration): Promise<Knex.Migration> {
    return entry.migration;
  }
}

export const migrationSource = new StaticMigrationSource();
