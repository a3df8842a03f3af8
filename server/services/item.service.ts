// =============================================================
// File: server/services/item.service.ts
// Description: Item master and the item repository. This is the
//              only code that writes items.total_quantity,
//              stock_value, avg_cost, avg_price and standard_cost,
//              and every
//              such write takes a transaction and a row lock.
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { Item, ItemKind, UnitType } from '../../shared/types';
import { applyIncoming, applyOutgoing, reverseIncoming, StockPosition } from '../domain/costing';
import { NotFoundError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { round2 } from '../lib/money';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface CreateItemInput {
  name: string;
  kind: ItemKind;
  unit_type?: UnitType;
}

export interface ItemFilters extends ListOptions {
  kind?: ItemKind;
}

/** Item aggregates before and after one costing step. */
export interface CostingResult {
  item_id: string;
  before: StockPosition;
  after: StockPosition;
  /** after.avgCost rounded to 2 places; the unit price ledger rows carry. */
  avg_price: number;
}

function positionOf(item: Item): StockPosition {
  return { quantity: item.total_quantity, value: item.stock_value, avgCost: item.avg_cost };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class ItemService extends BaseService<Item> {
  constructor() {
    super('items');
  }

  async createItem(input: CreateItemInput): Promise<Item> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Item name is required');

    return this.db.transaction(async (trx) => {
      const now = nowIso();
      const item: Item = {
        id: await generateUniqueId(trx, 'item', 'items'),
        name,
        kind: input.kind,
        unit_type: input.unit_type ?? 'PCS',
        total_quantity: 0,
        stock_value: 0,
        avg_cost: 0,
        avg_price: 0,
        standard_cost: 0,
        created_at: now,
        updated_at: now,
      };
      await trx('items').insert(item);
      return item;
    });
  }

  async getItem(id: string, trx?: Knex): Promise<Item> {
    const item = await this.getById(id, trx);
    if (!item) throw new NotFoundError('Item', id);
    return item;
  }

  async listItems(filters: ItemFilters = {}) {
    const query = this.db('items').select('*');
    if (filters.kind) query.where('kind', filters.kind);
    if (filters.search) {
      query.whereRaw('lower(name) like ?', [`%${filters.search.toLowerCase()}%`]);
    }
    return this.paginate<Item>(query, filters, [{ column: 'name', order: 'asc' }, { column: 'id', order: 'asc' }]);
  }

  /** Existing item of the given kind, or a ValidationError naming the role it was meant for. */
  async requireKind(db: Knex, id: string, kind: ItemKind, role = 'Item'): Promise<Item> {
    const item: Item | undefined = await db('items').where({ id }).first();
    if (!item) throw new ValidationError(`${role} ${id} does not exist`);
    if (item.kind !== kind) {
      throw new ValidationError(`${role} ${id} (${item.name}) must be a ${kind}, not a ${item.kind}`);
    }
    return item;
  }

  async lockItem(trx: Knex.Transaction, id: string): Promise<Item> {
    const item: Item | undefined = await trx('items').where({ id }).forUpdate().first();
    if (!item) throw new ValidationError(`Item ${id} does not exist`);
    return item;
  }

  /** Locks rows in id order so concurrent callers cannot deadlock each other. */
  async lockItems(trx: Knex.Transaction, ids: string[]): Promise<Map<string, Item>> {
    const unique = [...new Set(ids)].sort();
    const rows: Item[] = await trx('items').whereIn('id', unique).orderBy('id').forUpdate();
    const byId = new Map(rows.map((row) => [row.id, row]));
    const missing = unique.filter((id) => !byId.has(id));
    if (missing.length > 0) {
      throw new ValidationError(`Items do not exist: ${missing.join(', ')}`, { missing });
    }
    return byId;
  }

  // ──────────────────────────────────────────────────────────
  // Aggregate writers
  // ──────────────────────────────────────────────────────────

  async applyIncoming(trx: Knex.Transaction, itemId: string, qty: number, unitPrice: number): Promise<CostingResult> {
    const item = await this.lockItem(trx, itemId);
    return this.persist(trx, item, applyIncoming(positionOf(item), qty, unitPrice));
  }

  async applyOutgoing(trx: Knex.Transaction, itemId: string, qty: number): Promise<CostingResult> {
    const item = await this.lockItem(trx, itemId);
    return this.persist(trx, item, applyOutgoing(positionOf(item), qty, itemId));
  }

  async reverseIncoming(
    trx: Knex.Transaction,
    itemId: string,
    qty: number,
    unitPrice: number,
  ): Promise<CostingResult> {
    const item = await this.lockItem(trx, itemId);
    return this.persist(trx, item, reverseIncoming(positionOf(item), qty, unitPrice, itemId));
  }

  async setStandardCost(trx: Knex.Transaction, itemId: string, standardCost: number): Promise<number> {
    await this.lockItem(trx, itemId);
    const value = round2(standardCost);
    await trx('items').where({ id: itemId }).update({ standard_cost: value, updated_at: nowIso() });
    return value;
  }

  private async persist(trx: Knex.Transaction, item: Item, next: StockPosition): Promise<CostingResult> {
    const avgPrice = round2(next.avgCost);
    await trx('items').where({ id: item.id }).update({
      total_quantity: next.quantity,
      stock_value: next.value,
      avg_cost: next.avgCost,
      avg_price: avgPrice,
      updated_at: nowIso(),
    });
    return {
      item_id: item.id,
      before: positionOf(item),
      after: next,
      avg_price: avgPrice,
    };
  }
}

export const itemService = new ItemService();
